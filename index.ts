import dotenv from 'dotenv';

dotenv.config();

import startApi from './api';
import {Announcer} from './announcer';
import {readCatalog, loadCatalog} from './catalog';
import {ScoringCore} from './core';
import {loadConfig} from './lib/config';
import type {Config, ModuleName} from './lib/config';
import logger from './lib/logger';
import {MemoryLedgerStore} from './ledger/memory';
import {SqliteLedgerStore} from './ledger/sqlite';
import type {LedgerStore} from './ledger/store';

const log = logger.child({bot: 'index'});

process.on('unhandledRejection', (error: unknown, promise: Promise<unknown>) => {
	log.error(`unhandledRejection at: ${promise} reason: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
});

interface ModuleContext {
	config: Config,
	core: ScoringCore,
}

// 起動時に有効にできるモジュール。KOTH は core 側で組み立てるのでここでは何もしない
const modules: Record<ModuleName, (context: ModuleContext) => (() => void) | null> = {
	koth: () => null,
	announcer: ({config, core}) => {
		const {token, announceChannel} = config.slack;
		if (token === null || announceChannel === null) {
			log.warn('announcer is enabled but SLACK_TOKEN or CHANNEL_CTF_ANNOUNCE is missing; skipping');
			return null;
		}
		const announcer = Announcer.create({token, channel: announceChannel, events: core.events, store: core.store});
		announcer.start();
		return () => announcer.stop();
	},
};

const openStore = async (config: Config): Promise<LedgerStore> => {
	if (config.ledger.driver === 'sqlite') {
		return SqliteLedgerStore.create({filename: config.ledger.sqlitePath, timeoutMs: config.ledger.timeoutMs});
	}
	return new MemoryLedgerStore({timeoutMs: config.ledger.timeoutMs});
};

const main = async () => {
	const config = loadConfig();
	const store = await openStore(config);
	await loadCatalog(store, await readCatalog(config.catalogPath));

	const core = new ScoringCore({
		store,
		competition: config.competition,
		leaderboard: {
			stalenessMs: config.leaderboard.stalenessMs,
			debounceMs: config.leaderboard.debounceMs,
		},
		graceMs: config.reconcile.graceMs,
		koth: config.modules.includes('koth'),
	});

	const stoppers: (() => void)[] = [];
	for (const name of config.modules) {
		log.info(`Loading module ${name}`);
		const stop = modules[name]({config, core});
		if (stop !== null) {
			stoppers.push(stop);
		}
	}

	await core.start({
		leaderboardRefreshIntervalMs: config.leaderboard.refreshIntervalMs,
		reconcileIntervalMs: config.reconcile.intervalMs,
		kothTickIntervalMs: config.kothTickIntervalMs,
	});
	const fastify = await startApi(core, config.apiPort);

	const gracefulShutdown = async (signal: string) => {
		log.info(`Received ${signal}, starting graceful shutdown...`);

		try {
			await fastify.close();
			log.info('Fastify server closed');

			for (const stop of stoppers) {
				stop();
			}
			await core.stop();
			log.info('Graceful shutdown completed');
			process.exit(0);
		} catch (error) {
			log.error(`Error during graceful shutdown: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
			process.exit(1);
		}
	};

	process.on('SIGINT', () => gracefulShutdown('SIGINT'));
	process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
};

main().catch((error: unknown) => {
	log.error(`Failed to start: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
	process.exit(1);
});
