import {ScoreEventBus} from '../lib/scoreEvents';
import {MemoryLedgerStore} from '../ledger/memory';
import {challengeOf, kothTargetOf, seedLedger, teamOf} from '../ledger/fixtures';
import {Announcer} from '.';

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('Announcer', () => {
	let events: ScoreEventBus;
	let postMessage: jest.Mock;
	let announcer: Announcer;

	beforeEach(async () => {
		events = new ScoreEventBus();
		const store = await seedLedger(new MemoryLedgerStore(), {
			challenges: [challengeOf('web', {title: 'Warmup Web'})],
			teams: [teamOf('a', {name: 'Alpha'}), teamOf('b', {name: 'Bravo'})],
			kothTargets: [kothTargetOf('hill', {name: 'The Hill'})],
		});
		postMessage = jest.fn().mockResolvedValue({ok: true});
		announcer = new Announcer({events, store, slack: {chat: {postMessage}}, channel: 'C-CTF'});
		announcer.start();
	});

	afterEach(() => {
		announcer.stop();
	});

	it('announces first bloods', async () => {
		events.emit('first-blood', {teamId: 'a', challengeId: 'web', at: new Date()});
		await flush();

		expect(postMessage).toHaveBeenCalledTimes(1);
		expect(postMessage).toHaveBeenCalledWith(expect.objectContaining({
			channel: 'C-CTF',
			text: ':drop_of_blood: *Alpha* got the first blood on *Warmup Web*!',
		}));
	});

	it('announces captures and takeovers', async () => {
		events.emit('koth-takeover', {targetId: 'hill', teamId: 'a', previousTeamId: null, at: new Date()});
		events.emit('koth-takeover', {targetId: 'hill', teamId: 'b', previousTeamId: 'a', at: new Date()});
		await flush();

		expect(postMessage.mock.calls.map(([options]) => options.text)).toEqual([
			':crown: *Alpha* claimed *The Hill*',
			':crown: *Bravo* took *The Hill* from *Alpha*',
		]);
	});

	it('swallows Slack failures', async () => {
		postMessage.mockRejectedValue(new Error('ratelimited'));

		await expect(announcer.announceFirstBlood({teamId: 'a', challengeId: 'web', at: new Date()})).resolves.toBeUndefined();
	});

	it('stops listening once stopped', async () => {
		announcer.stop();
		events.emit('first-blood', {teamId: 'a', challengeId: 'web', at: new Date()});
		await flush();

		expect(postMessage).not.toHaveBeenCalled();
	});
});
