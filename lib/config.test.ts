import {ValidationError} from './errors';
import {loadConfig} from './config';

describe('loadConfig', () => {
	it('fills in defaults', () => {
		const config = loadConfig({});

		expect(config.env).toBe('development');
		expect(config.ledger).toEqual({driver: 'memory', sqlitePath: 'ledger.sqlite3', timeoutMs: 5000});
		expect(config.leaderboard).toEqual({stalenessMs: 5000, debounceMs: 500, refreshIntervalMs: 3000});
		expect(config.reconcile).toEqual({intervalMs: 60000, graceMs: 10000});
		expect(config.competition).toEqual({startsAt: null, endsAt: null});
		expect(config.modules).toEqual(['koth', 'announcer']);
		expect(config.slack).toEqual({token: null, announceChannel: null});
		expect(config.apiPort).toBe(20137);
		expect(Object.isFrozen(config)).toBe(true);
	});

	it('reads values from the environment', () => {
		const config = loadConfig({
			NODE_ENV: 'production',
			LEDGER_DRIVER: 'sqlite',
			LEDGER_TIMEOUT_MS: '1500',
			COMPETITION_START: '2024-03-01T00:00:00Z',
			COMPETITION_END: '2024-03-02T00:00:00+09:00',
			ENABLED_MODULES: ' announcer ,',
			SLACK_TOKEN: 'test-token',
			API_PORT: '8080',
		});

		expect(config.env).toBe('production');
		expect(config.ledger).toEqual({driver: 'sqlite', sqlitePath: 'ledger.sqlite3', timeoutMs: 1500});
		expect(config.competition).toEqual({
			startsAt: new Date('2024-03-01T00:00:00Z'),
			endsAt: new Date('2024-03-01T15:00:00Z'),
		});
		expect(config.modules).toEqual(['announcer']);
		expect(config.slack.token).toBe('test-token');
		expect(config.apiPort).toBe(8080);
	});

	it.each([
		['an unknown driver', {LEDGER_DRIVER: 'postgres'}],
		['a non-numeric timeout', {LEDGER_TIMEOUT_MS: 'soon'}],
		['an unknown module', {ENABLED_MODULES: 'koth,music'}],
		['a window that ends first', {COMPETITION_START: '2024-03-02T00:00:00Z', COMPETITION_END: '2024-03-01T00:00:00Z'}],
		['a debounce longer than the staleness bound', {LEADERBOARD_DEBOUNCE_MS: '6000'}],
	])('rejects %s', (_, env) => {
		expect(() => loadConfig(env)).toThrow(ValidationError);
	});
});
