import {z} from 'zod';
import {ValidationError} from './errors';

export const moduleNames = ['koth', 'announcer'] as const;
export type ModuleName = (typeof moduleNames)[number];

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const timestamp = z.string().datetime({offset: true}).transform((value) => new Date(value)).optional();

const configSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	LEDGER_DRIVER: z.enum(['memory', 'sqlite']).default('memory'),
	LEDGER_SQLITE_PATH: z.string().min(1).default('ledger.sqlite3'),
	LEDGER_TIMEOUT_MS: milliseconds(5000),
	LEADERBOARD_STALENESS_MS: milliseconds(5000),
	LEADERBOARD_DEBOUNCE_MS: milliseconds(500),
	LEADERBOARD_REFRESH_INTERVAL_MS: milliseconds(3000),
	RECONCILE_INTERVAL_MS: milliseconds(60 * 1000),
	RECONCILE_GRACE_MS: milliseconds(10 * 1000),
	KOTH_TICK_INTERVAL_MS: milliseconds(15 * 1000),
	CATALOG_PATH: z.string().min(1).default('catalog.json'),
	COMPETITION_START: timestamp,
	COMPETITION_END: timestamp,
	ENABLED_MODULES: z.string().default(moduleNames.join(','))
		.transform((value) => value.split(',').map((name) => name.trim()).filter((name) => name !== ''))
		.pipe(z.array(z.enum(moduleNames))),
	SLACK_TOKEN: z.string().optional(),
	CHANNEL_CTF_ANNOUNCE: z.string().optional(),
	API_PORT: z.coerce.number().int().min(0).max(65535).default(20137),
}).refine(
	({COMPETITION_START, COMPETITION_END}) => (
		COMPETITION_START === undefined ||
		COMPETITION_END === undefined ||
		COMPETITION_START.getTime() < COMPETITION_END.getTime()
	),
	{message: 'COMPETITION_END must be after COMPETITION_START', path: ['COMPETITION_END']},
).refine(
	({LEADERBOARD_DEBOUNCE_MS, LEADERBOARD_STALENESS_MS}) => LEADERBOARD_DEBOUNCE_MS < LEADERBOARD_STALENESS_MS,
	{message: 'LEADERBOARD_DEBOUNCE_MS must be below LEADERBOARD_STALENESS_MS', path: ['LEADERBOARD_DEBOUNCE_MS']},
);

export interface Config {
	env: 'development' | 'production' | 'test',
	ledger: {
		driver: 'memory' | 'sqlite',
		sqlitePath: string,
		timeoutMs: number,
	},
	leaderboard: {
		stalenessMs: number,
		debounceMs: number,
		refreshIntervalMs: number,
	},
	reconcile: {
		intervalMs: number,
		graceMs: number,
	},
	kothTickIntervalMs: number,
	catalogPath: string,
	competition: {
		startsAt: Date | null,
		endsAt: Date | null,
	},
	modules: ModuleName[],
	slack: {
		token: string | null,
		announceChannel: string | null,
	},
	apiPort: number,
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
	const parsed = configSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
		throw new ValidationError(`Invalid configuration: ${issues.join(', ')}`);
	}
	const {data} = parsed;

	return Object.freeze({
		env: data.NODE_ENV,
		ledger: {
			driver: data.LEDGER_DRIVER,
			sqlitePath: data.LEDGER_SQLITE_PATH,
			timeoutMs: data.LEDGER_TIMEOUT_MS,
		},
		leaderboard: {
			stalenessMs: data.LEADERBOARD_STALENESS_MS,
			debounceMs: data.LEADERBOARD_DEBOUNCE_MS,
			refreshIntervalMs: data.LEADERBOARD_REFRESH_INTERVAL_MS,
		},
		reconcile: {
			intervalMs: data.RECONCILE_INTERVAL_MS,
			graceMs: data.RECONCILE_GRACE_MS,
		},
		kothTickIntervalMs: data.KOTH_TICK_INTERVAL_MS,
		catalogPath: data.CATALOG_PATH,
		competition: {
			startsAt: data.COMPETITION_START ?? null,
			endsAt: data.COMPETITION_END ?? null,
		},
		modules: data.ENABLED_MODULES,
		slack: {
			token: data.SLACK_TOKEN ?? null,
			announceChannel: data.CHANNEL_CTF_ANNOUNCE ?? null,
		},
		apiPort: data.API_PORT,
	});
};
