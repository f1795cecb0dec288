import {debounce} from 'lodash';
import type {DebouncedFunc} from 'lodash';
import type {Clock} from '../lib/clock';
import logger from '../lib/logger';
import type {ScoreEventBus} from '../lib/scoreEvents';
import {Coalescer, detach} from '../lib/utils';
import type {LedgerStore} from '../ledger/store';
import {compareStandings} from '../scoring';
import type {ScoreAggregator} from '../scoring';

const log = logger.child({bot: 'leaderboard'});

export interface LeaderboardEntry {
	teamId: string,
	teamName: string,
	score: number,
	lastSolveAt: Date | null,
	rank: number,
}

interface Snapshot {
	entries: LeaderboardEntry[],
	// when the rebuild that produced this snapshot started reading scores
	startedAt: Date,
}

export interface LeaderboardCacheOptions {
	aggregator: ScoreAggregator,
	store: LedgerStore,
	events: ScoreEventBus,
	clock: Clock,
	stalenessMs: number,
	debounceMs: number,
}

/**
 * 順位表のキャッシュ。得点は ScoreAggregator から読むだけで、書き換えることはない。
 *
 * スナップショットは score-changed を受けてデバウンスしつつ再構築し、タイマーでも定期的に作り直す。
 * 読み出し時点で staleness を超えて古いスナップショットは返さず、その場で再構築を待つ。
 */
export class LeaderboardCache {
	#aggregator: ScoreAggregator;
	#store: LedgerStore;
	#events: ScoreEventBus;
	#clock: Clock;
	#stalenessMs: number;
	#snapshot: Snapshot | null = null;
	#rebuild: Coalescer<Snapshot>;
	#scheduleRefresh: DebouncedFunc<() => void>;
	#unsubscribe: (() => void) | null = null;
	#refreshTimer: NodeJS.Timeout | null = null;

	constructor({aggregator, store, events, clock, stalenessMs, debounceMs}: LeaderboardCacheOptions) {
		this.#aggregator = aggregator;
		this.#store = store;
		this.#events = events;
		this.#clock = clock;
		this.#stalenessMs = stalenessMs;
		this.#rebuild = new Coalescer(() => this.#build());
		this.#scheduleRefresh = debounce(() => {
			detach(this.refresh(), log, 'Debounced leaderboard refresh');
		}, debounceMs, {maxWait: Math.max(debounceMs, Math.floor(stalenessMs / 2))});
	}

	start(refreshIntervalMs: number) {
		if (this.#unsubscribe === null) {
			this.#unsubscribe = this.#events.on('score-changed', () => {
				this.#scheduleRefresh();
			});
		}
		if (this.#refreshTimer === null) {
			this.#refreshTimer = setInterval(() => {
				detach(this.refresh(), log, 'Periodic leaderboard refresh');
			}, refreshIntervalMs);
		}
	}

	stop() {
		this.#unsubscribe?.();
		this.#unsubscribe = null;
		this.#scheduleRefresh.cancel();
		if (this.#refreshTimer !== null) {
			clearInterval(this.#refreshTimer);
			this.#refreshTimer = null;
		}
	}

	get snapshotStartedAt() {
		return this.#snapshot?.startedAt ?? null;
	}

	async refresh(): Promise<LeaderboardEntry[]> {
		const snapshot = await this.#rebuild.run();
		return snapshot.entries;
	}

	async rankedTeams(): Promise<LeaderboardEntry[]> {
		const cutoff = this.#clock.now().getTime() - this.#stalenessMs;
		if (this.#snapshot !== null && this.#snapshot.startedAt.getTime() >= cutoff) {
			return this.#snapshot.entries;
		}

		let snapshot = await this.#rebuild.run();
		if (snapshot.startedAt.getTime() < cutoff) {
			// joined a rebuild that had started before the cutoff
			snapshot = await this.#rebuild.run();
		}
		return snapshot.entries;
	}

	async #build(): Promise<Snapshot> {
		const startedAt = this.#clock.now();
		const teams = await this.#store.listTeams();
		const standings = await Promise.all(teams.map(async (team) => ({
			team,
			standing: await this.#aggregator.standingOf(team.id),
		})));
		standings.sort((a, b) => compareStandings(a.standing, b.standing) || a.team.id.localeCompare(b.team.id));

		const entries: LeaderboardEntry[] = [];
		let rank = 0;
		for (const [index, {team, standing}] of standings.entries()) {
			if (index === 0 || compareStandings(standings[index - 1].standing, standing) !== 0) {
				rank++;
			}
			entries.push({
				teamId: team.id,
				teamName: team.name,
				score: standing.score,
				lastSolveAt: standing.lastSolveAt,
				rank,
			});
		}

		const snapshot = {entries, startedAt};
		if (this.#snapshot === null || this.#snapshot.startedAt.getTime() <= startedAt.getTime()) {
			this.#snapshot = snapshot;
		}
		log.debug(`Rebuilt leaderboard of ${entries.length} teams`);
		return snapshot;
	}
}
