import {sumBy} from 'lodash';
import type {Clock} from '../lib/clock';
import {ValidationError} from '../lib/errors';
import logger from '../lib/logger';
import type {ScoreEventBus} from '../lib/scoreEvents';
import {detach} from '../lib/utils';
import type {CompetitionWindow} from '../competition';
import type {LedgerStore} from '../ledger/store';
import type {KothAccrual, KothClaim, KothTarget, KothTransition} from '../ledger/types';
import {matchesFlag} from '../submissions/flag';

const log = logger.child({bot: 'koth'});

export type KothState =
	{state: 'unclaimed'} |
	{state: 'owned', teamId: string, since: Date, claimId: string} |
	{state: 'closed'};

export type RejectReason = 'invalid-proof' | 'contended' | 'closed';

export type ClaimResult =
	{status: 'claimed', claim: KothClaim, previousTeamId: string | null} |
	{status: 'already-owner', claim: KothClaim} |
	{status: 'rejected', reason: RejectReason, owner: KothClaim | null};

export interface ClaimRequest {
	teamId: string,
	targetId: string,
	proof?: string | null,
}

export interface KothArbiterOptions {
	store: LedgerStore,
	events: ScoreEventBus,
	clock: Clock,
	competition: CompetitionWindow,
}

/**
 * Points held since the claim was opened, in whole accrual units' worth, rounded down.
 */
export const accrualFor = (target: Pick<KothTarget, 'accrualPoints' | 'accrualUnitMs'>, claimedAt: Date, at: Date) => {
	const heldMs = Math.max(0, at.getTime() - claimedAt.getTime());
	return Math.floor(heldMs * target.accrualPoints / target.accrualUnitMs);
};

/**
 * King of the Hill のターゲットごとの所有権を調停する。
 *
 * 状態は Unclaimed, Owned(team, since), Closed の3つ。遷移はすべて台帳の compare-and-swap 1回で行い、
 * 同時に奪取を試みても成功するのは1チームだけ。負けた側は新しい所有者を見て rejected (contended) を受け取る。
 * 再試行は呼び出し元に任せる。
 */
export class KothArbiter {
	#store: LedgerStore;
	#events: ScoreEventBus;
	#clock: Clock;
	#competition: CompetitionWindow;
	#closed = false;
	#pending = new Set<Promise<ClaimResult>>();
	#tickTimer: NodeJS.Timeout | null = null;

	constructor({store, events, clock, competition}: KothArbiterOptions) {
		this.#store = store;
		this.#events = events;
		this.#clock = clock;
		this.#competition = competition;
	}

	get isClosed() {
		return this.#closed;
	}

	async claim(request: ClaimRequest): Promise<ClaimResult> {
		const running = this.#claim(request);
		this.#pending.add(running);
		try {
			return await running;
		} finally {
			this.#pending.delete(running);
		}
	}

	async #claim({teamId, targetId, proof = null}: ClaimRequest): Promise<ClaimResult> {
		const now = this.#clock.now();
		if (this.#closed || this.#competition.phase(now) === 'finished') {
			return {status: 'rejected', reason: 'closed', owner: await this.#store.openClaim(targetId)};
		}
		this.#competition.assertRunning(now);

		const [team, target] = await Promise.all([
			this.#store.getTeam(teamId),
			this.#store.getKothTarget(targetId),
		]);
		if (team === null) {
			throw new ValidationError(`Unknown team ${teamId}`);
		}
		if (target === null) {
			throw new ValidationError(`Unknown KOTH target ${targetId}`);
		}

		const current = await this.#store.openClaim(targetId);
		if (current !== null && current.teamId === teamId) {
			return {status: 'already-owner', claim: current};
		}
		if (current !== null && !this.#allowsTakeover(target, proof)) {
			log.debug(`Team ${teamId} failed the capture rule of ${targetId}`);
			return {status: 'rejected', reason: 'invalid-proof', owner: current};
		}

		const transition: KothTransition = current === null ?
			{targetId, expectedClaimId: null, open: {teamId, at: now}} :
			{
				...await this.#settlement(target, current, now),
				release: {at: now},
				open: {teamId, at: now},
			};

		if (this.#closed) {
			return {status: 'rejected', reason: 'closed', owner: current};
		}
		const result = await this.#store.compareAndSwapKoth(transition);
		if (!result.ok) {
			log.info(`Team ${teamId} lost the race for ${targetId}`, {teamId, targetId});
			return {status: 'rejected', reason: 'contended', owner: result.current};
		}
		if (result.claim === null) {
			throw new Error(`Claim on ${targetId} was not opened`);
		}

		this.#emitAccrual(result.accrual);
		const previousTeamId = current?.teamId ?? null;
		log.info(`Team ${teamId} captured ${targetId}${previousTeamId === null ? '' : ` from ${previousTeamId}`}`, {teamId, targetId});
		this.#events.emit('koth-takeover', {targetId, teamId, previousTeamId, at: now});

		return {status: 'claimed', claim: result.claim, previousTeamId};
	}

	/**
	 * Credits every current owner with the accrual owed so far. Targets that change hands meanwhile
	 * are skipped; the takeover settles them.
	 */
	async tick(): Promise<KothAccrual[]> {
		if (this.#closed) {
			return [];
		}
		const now = this.#clock.now();
		const targets = await this.#store.listKothTargets();
		const credited = await Promise.all(targets.map(async (target) => {
			const current = await this.#store.openClaim(target.id);
			if (current === null) {
				return null;
			}
			const settlement = await this.#settlement(target, current, now);
			if (settlement.accrual === undefined) {
				return null;
			}
			const result = await this.#store.compareAndSwapKoth(settlement);
			if (!result.ok) {
				return null;
			}
			this.#emitAccrual(result.accrual);
			return result.accrual;
		}));
		return credited.filter((accrual): accrual is KothAccrual => accrual !== null);
	}

	/**
	 * Ends the hill: every open claim is released with its final accrual and no claim is accepted afterwards.
	 */
	async closeAll(): Promise<KothClaim[]> {
		this.#closed = true;
		this.stopTicking();
		// 締め切り前に CAS まで進んだ claim は着地させてから精算する
		await Promise.allSettled([...this.#pending]);
		const now = this.#clock.now();
		const targets = await this.#store.listKothTargets();

		const released = await Promise.all(targets.map(async (target) => {
			// A tick can credit the owner between the read and the CAS, so settle until the target is empty.
			for (;;) {
				const current = await this.#store.openClaim(target.id);
				if (current === null) {
					return null;
				}
				const settlement = await this.#settlement(target, current, now);
				const result = await this.#store.compareAndSwapKoth({...settlement, release: {at: now}});
				if (result.ok) {
					this.#emitAccrual(result.accrual);
					return result.released;
				}
			}
		}));

		const closed = released.filter((claim): claim is KothClaim => claim !== null);
		log.info(`Closed ${closed.length} KOTH claims`);
		return closed;
	}

	async statusOf(targetId: string): Promise<KothState> {
		if (this.#closed) {
			return {state: 'closed'};
		}
		const target = await this.#store.getKothTarget(targetId);
		if (target === null) {
			throw new ValidationError(`Unknown KOTH target ${targetId}`);
		}
		const current = await this.#store.openClaim(targetId);
		if (current === null) {
			return {state: 'unclaimed'};
		}
		return {state: 'owned', teamId: current.teamId, since: current.claimedAt, claimId: current.id};
	}

	startTicking(intervalMs: number) {
		if (this.#tickTimer !== null || this.#closed) {
			return;
		}
		this.#tickTimer = setInterval(() => {
			detach(this.tick(), log, 'KOTH accrual tick');
		}, intervalMs);
	}

	stopTicking() {
		if (this.#tickTimer !== null) {
			clearInterval(this.#tickTimer);
			this.#tickTimer = null;
		}
	}

	#allowsTakeover(target: KothTarget, proof: string | null) {
		if (target.captureRule === 'open') {
			return true;
		}
		return proof !== null && proof.trim() !== '' && matchesFlag(proof, target.proof, {caseSensitive: false});
	}

	async #settlement(target: KothTarget, current: KothClaim, at: Date): Promise<KothTransition> {
		const accruals = await this.#store.listAccruals({claimId: current.id});
		const credited = sumBy(accruals, (accrual) => accrual.points);
		const owed = accrualFor(target, current.claimedAt, at) - credited;
		return {
			targetId: target.id,
			expectedClaimId: current.id,
			expectedCredited: credited,
			...(owed > 0 ? {accrual: {teamId: current.teamId, claimId: current.id, points: owed, creditedAt: at}} : {}),
		};
	}

	#emitAccrual(accrual: KothAccrual | null) {
		if (accrual === null) {
			return;
		}
		this.#events.emit('score-changed', {
			kind: 'koth',
			id: accrual.id,
			teamId: accrual.teamId,
			targetId: accrual.targetId,
			delta: accrual.points,
			at: accrual.creditedAt,
		});
	}
}
