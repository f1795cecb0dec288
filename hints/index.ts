import type {Clock} from '../lib/clock';
import {ValidationError} from '../lib/errors';
import logger from '../lib/logger';
import type {ScoreEventBus} from '../lib/scoreEvents';
import type {CompetitionWindow} from '../competition';
import type {LedgerStore} from '../ledger/store';
import type {Hint, HintUnlock} from '../ledger/types';

const log = logger.child({bot: 'hints'});

export type UnlockResult =
	{status: 'unlocked', cost: number, hint: Hint} |
	{status: 'already-unlocked', hint: Hint} |
	{status: 'out-of-order', missingRank: number};

export interface UnlockRequest {
	teamId: string,
	hintId: string,
}

export interface HintUnlockLedgerOptions {
	store: LedgerStore,
	events: ScoreEventBus,
	clock: Clock,
	competition: CompetitionWindow,
}

export class HintUnlockLedger {
	#store: LedgerStore;
	#events: ScoreEventBus;
	#clock: Clock;
	#competition: CompetitionWindow;

	constructor({store, events, clock, competition}: HintUnlockLedgerOptions) {
		this.#store = store;
		this.#events = events;
		this.#clock = clock;
		this.#competition = competition;
	}

	/**
	 * ヒントを開封し、コストを1回だけ差し引く。
	 *
	 * 同じチームが同じヒントを同時に開封しても台帳の条件付き挿入に勝つのは1件だけで、負けた側は課金されない。
	 * 同じ問題のより低いランクのヒントをすべて開封していなければ out-of-order になる。
	 */
	async unlock({teamId, hintId}: UnlockRequest): Promise<UnlockResult> {
		const now = this.#clock.now();
		this.#competition.assertRunning(now);

		const [team, hint] = await Promise.all([
			this.#store.getTeam(teamId),
			this.#store.getHint(hintId),
		]);
		if (team === null) {
			throw new ValidationError(`Unknown team ${teamId}`);
		}
		if (hint === null) {
			throw new ValidationError(`Unknown hint ${hintId}`);
		}
		const challenge = await this.#store.getChallenge(hint.challengeId);
		if (challenge === null || challenge.hidden || challenge.retired) {
			throw new ValidationError(`Hint ${hintId} is not available`);
		}

		const [siblings, unlocked] = await Promise.all([
			this.#store.listHints(hint.challengeId),
			this.#store.listHintUnlocks({teamId, challengeId: hint.challengeId}),
		]);
		const unlockedIds = new Set(unlocked.map((hintUnlock) => hintUnlock.hintId));
		if (unlockedIds.has(hintId)) {
			return {status: 'already-unlocked', hint};
		}

		const skipped = siblings
			.filter((sibling) => sibling.rank < hint.rank && !unlockedIds.has(sibling.id))
			.map((sibling) => sibling.rank);
		if (skipped.length > 0) {
			const missingRank = Math.min(...skipped);
			log.debug(`Team ${teamId} tried to unlock ${hintId} before rank ${missingRank}`);
			return {status: 'out-of-order', missingRank};
		}

		const hintUnlock = await this.#store.insertHintUnlock({
			teamId,
			hintId,
			challengeId: hint.challengeId,
			cost: hint.cost,
			unlockedAt: now,
		});
		if (hintUnlock === null) {
			return {status: 'already-unlocked', hint};
		}

		log.info(`Team ${teamId} unlocked ${hintId} for ${hintUnlock.cost} points`);
		this.#events.emit('score-changed', {
			kind: 'hint',
			id: hintUnlock.id,
			teamId,
			hintId,
			challengeId: hint.challengeId,
			delta: 0 - hintUnlock.cost,
			at: hintUnlock.unlockedAt,
		});

		return {status: 'unlocked', cost: hintUnlock.cost, hint};
	}

	unlockedHints(teamId: string, challengeId?: string): Promise<HintUnlock[]> {
		return this.#store.listHintUnlocks({teamId, challengeId});
	}
}
