import {ManualClock} from '../lib/clock';
import {ValidationError} from '../lib/errors';
import {ScoreEventBus} from '../lib/scoreEvents';
import type {ScoreChanged} from '../lib/scoreEvents';
import {CompetitionWindow} from '../competition';
import {MemoryLedgerStore} from '../ledger/memory';
import {challengeOf, hintOf, seedLedger, teamOf} from '../ledger/fixtures';
import {HintUnlockLedger} from '.';

describe('HintUnlockLedger', () => {
	let store: MemoryLedgerStore;
	let events: ScoreEventBus;
	let ledger: HintUnlockLedger;
	let scoreChanges: ScoreChanged[];

	beforeEach(async () => {
		store = new MemoryLedgerStore();
		events = new ScoreEventBus();
		const clock = new ManualClock();
		scoreChanges = [];
		events.on('score-changed', (event) => {
			scoreChanges.push(event);
		});
		await seedLedger(store, {
			challenges: [challengeOf('rev'), challengeOf('gone', {retired: true})],
			hints: [
				hintOf('rev-1', 'rev', {rank: 1, cost: 20}),
				hintOf('rev-2', 'rev', {rank: 2, cost: 50}),
				hintOf('rev-3', 'rev', {rank: 3, cost: 80}),
				hintOf('gone-1', 'gone'),
			],
			teams: [teamOf('a'), teamOf('b')],
		});
		ledger = new HintUnlockLedger({
			store,
			events,
			clock,
			competition: new CompetitionWindow({startsAt: null, endsAt: null, clock}),
		});
	});

	it('charges the hint cost once', async () => {
		const result = await ledger.unlock({teamId: 'a', hintId: 'rev-1'});

		expect(result).toMatchObject({status: 'unlocked', cost: 20});
		expect(scoreChanges).toHaveLength(1);
		expect(scoreChanges[0]).toMatchObject({kind: 'hint', teamId: 'a', hintId: 'rev-1', delta: -20});
		expect(await ledger.unlock({teamId: 'a', hintId: 'rev-1'})).toMatchObject({status: 'already-unlocked'});
		expect(scoreChanges).toHaveLength(1);
	});

	it('deducts only once when the same hint is unlocked concurrently', async () => {
		const results = await Promise.all(Array.from({length: 10}, () => ledger.unlock({teamId: 'a', hintId: 'rev-1'})));

		expect(results.filter((result) => result.status === 'unlocked')).toHaveLength(1);
		expect(results.filter((result) => result.status === 'already-unlocked')).toHaveLength(9);
		expect(await store.listHintUnlocks({teamId: 'a'})).toHaveLength(1);
		expect(scoreChanges).toHaveLength(1);
	});

	it('requires lower ranks to be unlocked first', async () => {
		expect(await ledger.unlock({teamId: 'a', hintId: 'rev-3'})).toEqual({status: 'out-of-order', missingRank: 1});
		await ledger.unlock({teamId: 'a', hintId: 'rev-1'});
		expect(await ledger.unlock({teamId: 'a', hintId: 'rev-3'})).toEqual({status: 'out-of-order', missingRank: 2});
		await ledger.unlock({teamId: 'a', hintId: 'rev-2'});
		expect(await ledger.unlock({teamId: 'a', hintId: 'rev-3'})).toMatchObject({status: 'unlocked', cost: 80});

		expect(scoreChanges.map((event) => event.delta)).toEqual([-20, -50, -80]);
	});

	it('tracks unlocks per team', async () => {
		await ledger.unlock({teamId: 'a', hintId: 'rev-1'});
		expect(await ledger.unlock({teamId: 'b', hintId: 'rev-2'})).toEqual({status: 'out-of-order', missingRank: 1});
		expect((await ledger.unlockedHints('a')).map((hintUnlock) => hintUnlock.hintId)).toEqual(['rev-1']);
		expect(await ledger.unlockedHints('b')).toEqual([]);
	});

	it('rejects unknown teams, unknown hints and hints of retired challenges', async () => {
		await expect(ledger.unlock({teamId: 'z', hintId: 'rev-1'})).rejects.toThrow(ValidationError);
		await expect(ledger.unlock({teamId: 'a', hintId: 'rev-9'})).rejects.toThrow(ValidationError);
		await expect(ledger.unlock({teamId: 'a', hintId: 'gone-1'})).rejects.toThrow('Hint gone-1 is not available');
		expect(await store.listHintUnlocks()).toEqual([]);
	});
});
