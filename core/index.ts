import {systemClock} from '../lib/clock';
import type {Clock} from '../lib/clock';
import logger from '../lib/logger';
import {ScoreEventBus} from '../lib/scoreEvents';
import {CompetitionWindow} from '../competition';
import {HintUnlockLedger} from '../hints';
import {KothArbiter} from '../koth';
import {LeaderboardCache} from '../leaderboard';
import type {LedgerStore} from '../ledger/store';
import type {KothClaim} from '../ledger/types';
import {ScoreAggregator} from '../scoring';
import {SubmissionValidator} from '../submissions';

const log = logger.child({bot: 'core'});

export interface ScoringCoreOptions {
	store: LedgerStore,
	clock?: Clock,
	competition?: {startsAt: Date | null, endsAt: Date | null},
	leaderboard: {stalenessMs: number, debounceMs: number},
	graceMs: number,
	koth: boolean,
}

export interface ScoringCoreTimers {
	leaderboardRefreshIntervalMs: number,
	reconcileIntervalMs: number,
	kothTickIntervalMs: number,
}

/**
 * 採点の中核。台帳とイベントバスを共有する各コンポーネントをまとめて組み立てる。
 * KOTH はモジュールとして無効にできる。
 */
export class ScoringCore {
	readonly store: LedgerStore;
	readonly clock: Clock;
	readonly events = new ScoreEventBus();
	readonly competition: CompetitionWindow;
	readonly submissions: SubmissionValidator;
	readonly hints: HintUnlockLedger;
	readonly aggregator: ScoreAggregator;
	readonly leaderboard: LeaderboardCache;
	readonly koth: KothArbiter | null;

	constructor({store, clock = systemClock, competition, leaderboard, graceMs, koth}: ScoringCoreOptions) {
		this.store = store;
		this.clock = clock;
		this.competition = new CompetitionWindow({
			startsAt: competition?.startsAt ?? null,
			endsAt: competition?.endsAt ?? null,
			clock,
		});

		const shared = {store, events: this.events, clock, competition: this.competition};
		this.submissions = new SubmissionValidator(shared);
		this.hints = new HintUnlockLedger(shared);
		this.koth = koth ? new KothArbiter(shared) : null;
		this.aggregator = new ScoreAggregator({store, events: this.events, clock, graceMs});
		this.leaderboard = new LeaderboardCache({
			aggregator: this.aggregator,
			store,
			events: this.events,
			clock,
			...leaderboard,
		});

		// the aggregator has to hear every event before anything that reads scores
		this.aggregator.start();
	}

	async start({leaderboardRefreshIntervalMs, reconcileIntervalMs, kothTickIntervalMs}: ScoringCoreTimers) {
		await this.aggregator.load();
		await this.leaderboard.refresh();
		this.leaderboard.start(leaderboardRefreshIntervalMs);
		this.aggregator.startReconciliation(reconcileIntervalMs);
		this.koth?.startTicking(kothTickIntervalMs);
		this.competition.scheduleEnd(async () => {
			await this.close();
		});
		log.info(`Scoring core started (competition ${this.competition.phase()})`);
	}

	/**
	 * Ends the competition now: no further submission, unlock or claim is accepted and every
	 * open KOTH claim is settled.
	 */
	async close(): Promise<KothClaim[]> {
		this.competition.finish();
		const released = this.koth === null ? [] : await this.koth.closeAll();
		await this.leaderboard.refresh();
		log.info('Competition closed');
		return released;
	}

	async stop() {
		this.koth?.stopTicking();
		this.leaderboard.stop();
		this.aggregator.stop();
		this.competition.cancelSchedule();
		this.events.removeAllListeners();
		await this.store.close();
	}
}
