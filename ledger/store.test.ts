import {MemoryLedgerStore} from './memory';
import {SqliteLedgerStore} from './sqlite';
import {challengeOf, hintOf, seedLedger, teamOf} from './fixtures';
import type {LedgerStore} from './store';
import type {SubmissionDraft} from './types';

const drivers: [string, () => Promise<LedgerStore>][] = [
	['memory', async () => new MemoryLedgerStore()],
	['sqlite', () => SqliteLedgerStore.create({filename: ':memory:'})],
];

const at = new Date('2024-01-01T00:10:00Z');

const draftOf = (teamId: string, outcome: SubmissionDraft['outcome']): SubmissionDraft => ({
	teamId,
	challengeId: 'web',
	userId: `${teamId}-player`,
	text: 'FLAG{web}',
	submittedAt: at,
	outcome,
	value: outcome === 'correct' ? 100 : 0,
});

describe.each(drivers)('%s ledger', (name, open) => {
	let store: LedgerStore;

	beforeEach(async () => {
		store = await seedLedger(await open(), {
			challenges: [challengeOf('web', {caseSensitive: true})],
			hints: [hintOf('web-2', 'web', {rank: 2}), hintOf('web-1', 'web', {rank: 1})],
			teams: [teamOf('b', {members: ['bob', 'bea']}), teamOf('a')],
		});
	});

	afterEach(async () => {
		await store.close();
	});

	it('round-trips catalog entries', async () => {
		expect(await store.getChallenge('web')).toEqual(challengeOf('web', {caseSensitive: true}));
		expect(await store.getTeam('b')).toEqual(teamOf('b', {members: ['bob', 'bea']}));
		expect(await store.getChallenge('nope')).toBeNull();
		expect((await store.listTeams()).map((team) => team.id)).toEqual(['a', 'b']);
		expect((await store.listHints('web')).map((hint) => hint.id)).toEqual(['web-1', 'web-2']);
	});

	it('awards only one of many concurrent correct submissions', async () => {
		const results = await Promise.all(Array.from({length: 8}, () => store.recordSubmission(draftOf('a', 'correct'))));

		expect(results.filter((result) => result.awarded)).toHaveLength(1);
		const submissions = await store.listSubmissions({teamId: 'a'});
		expect(submissions).toHaveLength(8);
		expect(submissions.filter((submission) => submission.outcome === 'correct')).toHaveLength(1);
		expect(submissions.filter((submission) => submission.outcome === 'duplicate').map((submission) => submission.value))
			.toEqual([0, 0, 0, 0, 0, 0, 0]);
	});

	it('keeps awards of different teams apart', async () => {
		const [first, second] = await Promise.all([
			store.recordSubmission(draftOf('a', 'correct')),
			store.recordSubmission(draftOf('b', 'correct')),
		]);
		expect(first.awarded).toBe(true);
		expect(second.awarded).toBe(true);
	});

	it('records incorrect attempts with no value', async () => {
		const result = await store.recordSubmission(draftOf('a', 'incorrect'));
		expect(result.awarded).toBe(false);
		expect(result.submission.outcome).toBe('incorrect');
		expect(await store.listSubmissions({outcome: 'correct'})).toEqual([]);
	});

	it('inserts a hint unlock once per team and hint', async () => {
		const draft = {teamId: 'a', hintId: 'web-1', challengeId: 'web', cost: 20, unlockedAt: at};
		const results = await Promise.all([store.insertHintUnlock(draft), store.insertHintUnlock(draft), store.insertHintUnlock(draft)]);

		expect(results.filter((result) => result !== null)).toHaveLength(1);
		expect(await store.listHintUnlocks({teamId: 'a'})).toHaveLength(1);
		expect(await store.insertHintUnlock({...draft, teamId: 'b'})).not.toBeNull();
	});

	describe('compareAndSwapKoth', () => {
		it('opens a claim only while the target is free', async () => {
			const opened = await store.compareAndSwapKoth({targetId: 'hill', expectedClaimId: null, open: {teamId: 'a', at}});
			expect(opened.ok).toBe(true);

			const lost = await store.compareAndSwapKoth({targetId: 'hill', expectedClaimId: null, open: {teamId: 'b', at}});
			expect(lost.ok).toBe(false);
			if (!lost.ok) {
				expect(lost.current?.teamId).toBe('a');
			}
		});

		it('credits, releases and reopens in one step', async () => {
			const opened = await store.compareAndSwapKoth({targetId: 'hill', expectedClaimId: null, open: {teamId: 'a', at}});
			if (!opened.ok || opened.claim === null) {
				throw new Error('claim was not opened');
			}
			const later = new Date(at.getTime() + 5000);

			const swapped = await store.compareAndSwapKoth({
				targetId: 'hill',
				expectedClaimId: opened.claim.id,
				expectedCredited: 0,
				accrual: {teamId: 'a', claimId: opened.claim.id, points: 5, creditedAt: later},
				release: {at: later},
				open: {teamId: 'b', at: later},
			});

			expect(swapped.ok).toBe(true);
			if (swapped.ok) {
				expect(swapped.released?.teamId).toBe('a');
				expect(swapped.released?.releasedAt).toEqual(later);
				expect(swapped.claim?.teamId).toBe('b');
				expect(swapped.accrual?.points).toBe(5);
			}
			expect((await store.openClaim('hill'))?.teamId).toBe('b');
			expect(await store.listClaims('hill')).toHaveLength(2);
			expect((await store.listAccruals({teamId: 'a'})).map((accrual) => accrual.points)).toEqual([5]);
		});

		it('rejects a step whose credited total is out of date', async () => {
			const opened = await store.compareAndSwapKoth({targetId: 'hill', expectedClaimId: null, open: {teamId: 'a', at}});
			if (!opened.ok || opened.claim === null) {
				throw new Error('claim was not opened');
			}
			const claimId = opened.claim.id;
			await store.compareAndSwapKoth({
				targetId: 'hill',
				expectedClaimId: claimId,
				expectedCredited: 0,
				accrual: {teamId: 'a', claimId, points: 3, creditedAt: at},
			});

			const stale = await store.compareAndSwapKoth({
				targetId: 'hill',
				expectedClaimId: claimId,
				expectedCredited: 0,
				accrual: {teamId: 'a', claimId, points: 3, creditedAt: at},
			});

			expect(stale.ok).toBe(false);
			expect(await store.listAccruals({claimId})).toHaveLength(1);
		});

		it('lets exactly one of several concurrent openers win', async () => {
			const results = await Promise.all(['a', 'b', 'c', 'd'].map((teamId) => (
				store.compareAndSwapKoth({targetId: 'hill', expectedClaimId: null, open: {teamId, at}})
			)));

			expect(results.filter((result) => result.ok)).toHaveLength(1);
			expect(await store.listClaims('hill')).toHaveLength(1);
		});
	});

	it(`reports the ${name} driver's reads in insertion order`, async () => {
		await store.recordSubmission(draftOf('b', 'incorrect'));
		await store.recordSubmission(draftOf('a', 'incorrect'));
		expect((await store.listSubmissions()).map((submission) => submission.teamId)).toEqual(['b', 'a']);
	});
});
