import {Mutex} from 'async-mutex';
import {maxBy, sumBy} from 'lodash';
import type {Clock} from '../lib/clock';
import {ReconciliationMismatch, ValidationError} from '../lib/errors';
import logger from '../lib/logger';
import type {ScoreChanged, ScoreEventBus} from '../lib/scoreEvents';
import {detach} from '../lib/utils';
import type {LedgerStore} from '../ledger/store';

const log = logger.child({bot: 'scoring'});

export interface TeamStanding {
	teamId: string,
	score: number,
	lastSolveAt: Date | null,
	solves: number,
}

export interface FoldedEvent {
	id: string,
	kind: ScoreChanged['kind'],
	delta: number,
	at: Date,
}

export interface FoldResult {
	standing: TeamStanding,
	events: FoldedEvent[],
}

interface RunningTotal {
	score: number,
	lastSolveAt: Date | null,
	solves: number,
	applied: Set<string>,
}

/**
 * Ranking order: teams with at least one solve come before teams without, then higher score,
 * then the earlier last solve.
 */
export const compareStandings = (a: TeamStanding, b: TeamStanding) => {
	if ((a.lastSolveAt === null) !== (b.lastSolveAt === null)) {
		return a.lastSolveAt === null ? 1 : -1;
	}
	if (a.score !== b.score) {
		return b.score - a.score;
	}
	if (a.lastSolveAt !== null && b.lastSolveAt !== null) {
		return a.lastSolveAt.getTime() - b.lastSolveAt.getTime();
	}
	return 0;
};

export interface ScoreAggregatorOptions {
	store: LedgerStore,
	events: ScoreEventBus,
	clock: Clock,
	// committed events older than this must have reached the running total
	graceMs: number,
}

/**
 * チームの得点の唯一の出どころ。
 *
 * 得点は台帳から導出する値で、直接書き換えるカウンタは持たない。
 * 各チームの累計は score-changed を1件ずつ適用して増分的に保ちつつ、台帳全体を畳み込んだ結果と突き合わせる。
 * 適用済みのイベント ID を記録しているので、再計算と遅れて届いたイベントが重なっても二重に数えない。
 * ロックはチーム単位で、チームをまたいだ直列化はしない。
 */
export class ScoreAggregator {
	#store: LedgerStore;
	#events: ScoreEventBus;
	#clock: Clock;
	#graceMs: number;
	#totals = new Map<string, RunningTotal>();
	#locks = new Map<string, Mutex>();
	#unsubscribe: (() => void) | null = null;
	#reconcileTimer: NodeJS.Timeout | null = null;

	constructor({store, events, clock, graceMs}: ScoreAggregatorOptions) {
		this.#store = store;
		this.#events = events;
		this.#clock = clock;
		this.#graceMs = graceMs;
	}

	start() {
		if (this.#unsubscribe === null) {
			this.#unsubscribe = this.#events.on('score-changed', (event) => this.apply(event));
		}
	}

	async load() {
		const teams = await this.#store.listTeams();
		await Promise.all(teams.map((team) => this.recompute(team.id)));
		log.info(`Loaded scores of ${teams.length} teams`);
	}

	/**
	 * Applies one event to the team's running total. A team without a running total is left
	 * alone: its first read folds the ledger, which already holds the event.
	 */
	apply(event: ScoreChanged) {
		return this.#lockOf(event.teamId).runExclusive(() => {
			const running = this.#totals.get(event.teamId);
			if (running === undefined || running.applied.has(event.id)) {
				return;
			}
			running.applied.add(event.id);
			running.score += event.delta;
			if (event.kind === 'solve') {
				running.solves += 1;
				if (running.lastSolveAt === null || running.lastSolveAt.getTime() < event.at.getTime()) {
					running.lastSolveAt = event.at;
				}
			}
		});
	}

	/**
	 * Folds the team's whole ledger history. This is the reference every other score is checked against.
	 */
	async fold(teamId: string): Promise<FoldResult> {
		const team = await this.#store.getTeam(teamId);
		if (team === null) {
			throw new ValidationError(`Unknown team ${teamId}`);
		}

		const [solves, hintUnlocks, accruals] = await Promise.all([
			this.#store.listSubmissions({teamId, outcome: 'correct'}),
			this.#store.listHintUnlocks({teamId}),
			this.#store.listAccruals({teamId}),
		]);

		const events: FoldedEvent[] = [
			...solves.map((submission) => ({id: submission.id, kind: 'solve' as const, delta: submission.value, at: submission.submittedAt})),
			...hintUnlocks.map((hintUnlock) => ({id: hintUnlock.id, kind: 'hint' as const, delta: 0 - hintUnlock.cost, at: hintUnlock.unlockedAt})),
			...accruals.map((accrual) => ({id: accrual.id, kind: 'koth' as const, delta: accrual.points, at: accrual.creditedAt})),
		];
		const lastSolve = maxBy(solves, (submission) => submission.submittedAt.getTime());

		return {
			standing: {
				teamId,
				score: sumBy(events, (event) => event.delta),
				lastSolveAt: lastSolve === undefined ? null : lastSolve.submittedAt,
				solves: solves.length,
			},
			events,
		};
	}

	async recompute(teamId: string): Promise<TeamStanding> {
		const lock = await this.#registeredLockOf(teamId);
		return lock.runExclusive(() => this.#install(teamId));
	}

	async standingOf(teamId: string): Promise<TeamStanding> {
		const running = this.#totals.get(teamId);
		if (running === undefined) {
			return this.recompute(teamId);
		}
		return {
			teamId,
			score: running.score,
			lastSolveAt: running.lastSolveAt,
			solves: running.solves,
		};
	}

	async scoreOf(teamId: string) {
		const {score} = await this.standingOf(teamId);
		return score;
	}

	async lastSolveAt(teamId: string) {
		const {lastSolveAt} = await this.standingOf(teamId);
		return lastSolveAt;
	}

	async standings(): Promise<TeamStanding[]> {
		const teams = await this.#store.listTeams();
		return Promise.all(teams.map((team) => this.standingOf(team.id)));
	}

	/**
	 * Checks running totals against the ledger. A drifted team gets a fresh total from the fold;
	 * the mismatches found are returned after being logged.
	 */
	async reconcile(teamId?: string): Promise<ReconciliationMismatch[]> {
		const teamIds = teamId === undefined ? Array.from(this.#totals.keys()) : [teamId];
		const results = await Promise.all(teamIds.map(async (id) => {
			const lock = await this.#registeredLockOf(id);
			return lock.runExclusive(() => this.#reconcileTeam(id));
		}));
		return results.filter((mismatch): mismatch is ReconciliationMismatch => mismatch !== null);
	}

	/**
	 * Teams that hold a lock, i.e. every registered team the aggregator has touched.
	 */
	get lockedTeamIds() {
		return Array.from(this.#locks.keys());
	}

	startReconciliation(intervalMs: number) {
		if (this.#reconcileTimer !== null) {
			return;
		}
		this.#reconcileTimer = setInterval(() => {
			detach(this.reconcile(), log, 'Periodic reconciliation');
		}, intervalMs);
	}

	stop() {
		this.#unsubscribe?.();
		this.#unsubscribe = null;
		if (this.#reconcileTimer !== null) {
			clearInterval(this.#reconcileTimer);
			this.#reconcileTimer = null;
		}
	}

	async #reconcileTeam(teamId: string): Promise<ReconciliationMismatch | null> {
		const running = this.#totals.get(teamId);
		if (running === undefined) {
			await this.#install(teamId);
			return null;
		}

		const {standing, events} = await this.fold(teamId);
		const ledgerIds = new Set(events.map((event) => event.id));
		const now = this.#clock.now().getTime();

		const problems: string[] = [];
		const phantom = Array.from(running.applied).filter((id) => !ledgerIds.has(id));
		if (phantom.length > 0) {
			problems.push(`${phantom.length} applied events missing from the ledger`);
		}
		const expected = sumBy(events.filter((event) => running.applied.has(event.id)), (event) => event.delta);
		if (expected !== running.score) {
			problems.push(`running total ${running.score} differs from the ${expected} its applied events add up to`);
		}
		const missed = events.filter((event) => !running.applied.has(event.id) && now - event.at.getTime() >= this.#graceMs);
		if (missed.length > 0) {
			problems.push(`${missed.length} committed events never applied`);
		}

		if (problems.length === 0) {
			return null;
		}

		const mismatch = new ReconciliationMismatch(teamId, running.score, standing.score, problems.join('; '));
		log.error(mismatch.message, {teamId});
		this.#totals.set(teamId, {
			score: standing.score,
			lastSolveAt: standing.lastSolveAt,
			solves: standing.solves,
			applied: ledgerIds,
		});
		return mismatch;
	}

	async #install(teamId: string): Promise<TeamStanding> {
		const {standing, events} = await this.fold(teamId);
		this.#totals.set(teamId, {
			score: standing.score,
			lastSolveAt: standing.lastSolveAt,
			solves: standing.solves,
			applied: new Set(events.map((event) => event.id)),
		});
		return standing;
	}

	// 未登録のチーム ID ではロックを作らない
	async #registeredLockOf(teamId: string) {
		if (!this.#locks.has(teamId) && await this.#store.getTeam(teamId) === null) {
			throw new ValidationError(`Unknown team ${teamId}`);
		}
		return this.#lockOf(teamId);
	}

	#lockOf(teamId: string) {
		let lock = this.#locks.get(teamId);
		if (lock === undefined) {
			lock = new Mutex();
			this.#locks.set(teamId, lock);
		}
		return lock;
	}
}
