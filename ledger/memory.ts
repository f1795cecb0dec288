import {Mutex, withTimeout, type MutexInterface} from 'async-mutex';
import {cloneDeep, sortBy, sumBy} from 'lodash';
import {randomUUID} from 'crypto';
import {StoreUnavailable} from '../lib/errors';
import logger from '../lib/logger';
import type {LedgerStore} from './store';
import type {
	AccrualFilter,
	Challenge,
	Hint,
	HintUnlock,
	HintUnlockDraft,
	HintUnlockFilter,
	KothAccrual,
	KothClaim,
	KothTarget,
	KothTransition,
	KothTransitionResult,
	RecordSubmissionResult,
	Submission,
	SubmissionDraft,
	SubmissionFilter,
	Team,
} from './types';

const log = logger.child({bot: 'ledger/memory'});

const pairKey = (a: string, b: string) => `${a}\u0000${b}`;

// Every write yields once before its atomic section, the way a round trip to a real store would.
const roundTrip = () => Promise.resolve();

/**
 * プロセス内で完結する台帳。development 環境とテストで用いる。
 *
 * 条件付き挿入は await を挟まずに確認と挿入を行うので、呼び出し元が並行していても原子的に動作する。
 * KOTH の compare-and-swap はターゲットごとの Mutex の中で行うので、別のターゲット同士は競合しない。
 */
export class MemoryLedgerStore implements LedgerStore {
	#challenges = new Map<string, Challenge>();
	#hints = new Map<string, Hint>();
	#teams = new Map<string, Team>();
	#targets = new Map<string, KothTarget>();

	#submissions: Submission[] = [];
	#awards = new Set<string>();
	#hintUnlocks = new Map<string, HintUnlock>();
	#claims = new Map<string, KothClaim[]>();
	#accruals: KothAccrual[] = [];

	#targetLocks = new Map<string, MutexInterface>();
	#timeoutMs: number;

	constructor({timeoutMs = 5000}: {timeoutMs?: number} = {}) {
		this.#timeoutMs = timeoutMs;
	}

	async putChallenge(challenge: Challenge) {
		this.#challenges.set(challenge.id, cloneDeep(challenge));
	}

	async putHint(hint: Hint) {
		this.#hints.set(hint.id, cloneDeep(hint));
	}

	async putTeam(team: Team) {
		this.#teams.set(team.id, cloneDeep(team));
	}

	async putKothTarget(target: KothTarget) {
		this.#targets.set(target.id, cloneDeep(target));
	}

	async getChallenge(id: string) {
		return cloneDeep(this.#challenges.get(id) ?? null);
	}

	async getHint(id: string) {
		return cloneDeep(this.#hints.get(id) ?? null);
	}

	async getTeam(id: string) {
		return cloneDeep(this.#teams.get(id) ?? null);
	}

	async getKothTarget(id: string) {
		return cloneDeep(this.#targets.get(id) ?? null);
	}

	async listTeams() {
		return cloneDeep(sortBy(Array.from(this.#teams.values()), (team) => team.id));
	}

	async listHints(challengeId: string) {
		const hints = Array.from(this.#hints.values()).filter((hint) => hint.challengeId === challengeId);
		return cloneDeep(sortBy(hints, (hint) => hint.rank));
	}

	async listKothTargets() {
		return cloneDeep(sortBy(Array.from(this.#targets.values()), (target) => target.id));
	}

	async recordSubmission(draft: SubmissionDraft): Promise<RecordSubmissionResult> {
		await roundTrip();

		if (draft.outcome !== 'correct') {
			const submission = this.#append({...draft, value: 0});
			return {awarded: false, submission};
		}

		const key = pairKey(draft.teamId, draft.challengeId);
		if (this.#awards.has(key)) {
			const submission = this.#append({...draft, outcome: 'duplicate', value: 0});
			return {awarded: false, submission};
		}
		this.#awards.add(key);
		const submission = this.#append(draft);
		return {awarded: true, submission};
	}

	async insertHintUnlock(draft: HintUnlockDraft) {
		await roundTrip();

		const key = pairKey(draft.teamId, draft.hintId);
		if (this.#hintUnlocks.has(key)) {
			return null;
		}
		const hintUnlock: HintUnlock = {id: randomUUID(), ...cloneDeep(draft)};
		this.#hintUnlocks.set(key, hintUnlock);
		return cloneDeep(hintUnlock);
	}

	async compareAndSwapKoth(transition: KothTransition): Promise<KothTransitionResult> {
		const lock = this.#lockFor(transition.targetId);
		return lock.runExclusive(async (): Promise<KothTransitionResult> => {
			await roundTrip();

			const claims = this.#claims.get(transition.targetId) ?? [];
			const current = claims.find((claim) => claim.releasedAt === null) ?? null;

			if ((current?.id ?? null) !== transition.expectedClaimId) {
				return {ok: false, current: cloneDeep(current)};
			}
			if (current !== null && transition.expectedCredited !== undefined) {
				const credited = sumBy(this.#accruals.filter((accrual) => accrual.claimId === current.id), (accrual) => accrual.points);
				if (credited !== transition.expectedCredited) {
					return {ok: false, current: cloneDeep(current)};
				}
			}
			if (transition.open && current !== null && !transition.release) {
				throw new Error(`Target ${transition.targetId} already has an open claim`);
			}
			if (transition.release && current === null) {
				throw new Error(`Target ${transition.targetId} has no open claim to release`);
			}

			let accrual: KothAccrual | null = null;
			if (transition.accrual && transition.accrual.points > 0) {
				accrual = {
					id: randomUUID(),
					targetId: transition.targetId,
					...cloneDeep(transition.accrual),
				};
				this.#accruals.push(accrual);
			}

			let released: KothClaim | null = null;
			if (transition.release && current !== null) {
				current.releasedAt = new Date(transition.release.at);
				released = current;
			}

			let claim: KothClaim | null = current?.releasedAt === null ? current : null;
			if (transition.open) {
				claim = {
					id: randomUUID(),
					targetId: transition.targetId,
					teamId: transition.open.teamId,
					claimedAt: new Date(transition.open.at),
					releasedAt: null,
				};
				claims.push(claim);
				this.#claims.set(transition.targetId, claims);
			}

			return {
				ok: true,
				claim: cloneDeep(claim),
				released: cloneDeep(released),
				accrual: cloneDeep(accrual),
			};
		});
	}

	async listSubmissions(filter: SubmissionFilter = {}) {
		return cloneDeep(this.#submissions.filter((submission) => (
			(filter.teamId === undefined || submission.teamId === filter.teamId) &&
			(filter.challengeId === undefined || submission.challengeId === filter.challengeId) &&
			(filter.outcome === undefined || submission.outcome === filter.outcome)
		)));
	}

	async listHintUnlocks(filter: HintUnlockFilter = {}) {
		const hintUnlocks = Array.from(this.#hintUnlocks.values()).filter((hintUnlock) => (
			(filter.teamId === undefined || hintUnlock.teamId === filter.teamId) &&
			(filter.challengeId === undefined || hintUnlock.challengeId === filter.challengeId)
		));
		return cloneDeep(hintUnlocks);
	}

	async listAccruals(filter: AccrualFilter = {}) {
		return cloneDeep(this.#accruals.filter((accrual) => (
			(filter.teamId === undefined || accrual.teamId === filter.teamId) &&
			(filter.targetId === undefined || accrual.targetId === filter.targetId) &&
			(filter.claimId === undefined || accrual.claimId === filter.claimId)
		)));
	}

	async openClaim(targetId: string) {
		const claims = this.#claims.get(targetId) ?? [];
		return cloneDeep(claims.find((claim) => claim.releasedAt === null) ?? null);
	}

	async listClaims(targetId: string) {
		return cloneDeep(this.#claims.get(targetId) ?? []);
	}

	async close() {
		log.debug('Memory ledger closed');
	}

	#append(draft: SubmissionDraft) {
		const submission: Submission = {id: randomUUID(), ...cloneDeep(draft)};
		this.#submissions.push(submission);
		return cloneDeep(submission);
	}

	#lockFor(targetId: string) {
		let lock = this.#targetLocks.get(targetId);
		if (lock === undefined) {
			lock = withTimeout(
				new Mutex(),
				this.#timeoutMs,
				new StoreUnavailable(`Timed out waiting for KOTH target ${targetId}`, 'failed'),
			);
			this.#targetLocks.set(targetId, lock);
		}
		return lock;
	}
}
