import {ManualClock} from '../lib/clock';
import {MemoryLedgerStore} from '../ledger/memory';
import {challengeOf, hintOf, kothTargetOf, seedLedger, teamOf} from '../ledger/fixtures';
import {ScoringCore} from '.';

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('ScoringCore', () => {
	let clock: ManualClock;
	let core: ScoringCore;

	const build = async (koth: boolean) => {
		const store = await seedLedger(new MemoryLedgerStore(), {
			challenges: [challengeOf('web', {value: 100, flag: 'flag{abc}'})],
			hints: [hintOf('web-1', 'web', {cost: 20})],
			teams: [teamOf('a'), teamOf('b')],
			kothTargets: [kothTargetOf('hill', {accrualPoints: 2, accrualUnitMs: 1000})],
		});
		return new ScoringCore({
			store,
			clock,
			leaderboard: {stalenessMs: 5000, debounceMs: 100},
			graceMs: 5000,
			koth,
		});
	};

	beforeEach(async () => {
		clock = new ManualClock('2024-01-01T00:00:00Z');
		core = await build(true);
		await core.start({leaderboardRefreshIntervalMs: 60 * 1000, reconcileIntervalMs: 60 * 1000, kothTickIntervalMs: 60 * 1000});
	});

	afterEach(async () => {
		await core.stop();
	});

	it('scores a hint then a solve as 80 and ignores the resubmission', async () => {
		expect(await core.hints.unlock({teamId: 'a', hintId: 'web-1'})).toMatchObject({status: 'unlocked'});
		expect(await core.submissions.submit({teamId: 'a', challengeId: 'web', text: 'flag{abc}'})).toBe('accepted');
		expect(await core.submissions.submit({teamId: 'a', challengeId: 'web', text: 'FLAG{ABC}'})).toBe('already-solved');
		await flush();

		expect(await core.aggregator.scoreOf('a')).toBe(80);
		expect(await core.aggregator.reconcile()).toEqual([]);
	});

	it('counts a same-millisecond double solve once', async () => {
		await Promise.all([
			core.submissions.submit({teamId: 'b', challengeId: 'web', userId: 'b-1', text: 'flag{abc}'}),
			core.submissions.submit({teamId: 'b', challengeId: 'web', userId: 'b-2', text: 'flag{abc}'}),
		]);
		await flush();

		expect(await core.aggregator.scoreOf('b')).toBe(100);
		expect((await core.aggregator.recompute('b')).score).toBe(100);
	});

	it('settles KOTH and stops accepting work when closed', async () => {
		await core.koth?.claim({teamId: 'b', targetId: 'hill'});
		clock.advance(3000);

		const released = await core.close();
		await flush();

		expect(released.map((claim) => claim.teamId)).toEqual(['b']);
		expect(await core.aggregator.scoreOf('b')).toBe(6);
		expect(core.competition.phase()).toBe('finished');
		await expect(core.submissions.submit({teamId: 'a', challengeId: 'web', text: 'flag{abc}'})).rejects.toThrow('The competition has ended');
		expect((await core.leaderboard.refresh()).map(({teamId, score}) => [teamId, score])).toEqual([['b', 6], ['a', 0]]);
	});

	it('leaves KOTH out when the module is disabled', async () => {
		const withoutKoth = await build(false);
		expect(withoutKoth.koth).toBeNull();
		expect(await withoutKoth.close()).toEqual([]);
		await withoutKoth.stop();
	});
});
