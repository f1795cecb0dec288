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

/**
 * 大会の台帳。スコアに関わる行はすべて追記のみで、更新されるのは KothClaim.releasedAt だけ。
 *
 * 競合の解決はすべてこのインターフェースの原子操作に任せる:
 * - recordSubmission: correct な行は (team, challenge) ごとに1行だけ挿入される条件付き挿入
 * - insertHintUnlock: (team, hint) ごとに1行だけ挿入される条件付き挿入
 * - compareAndSwapKoth: ターゲットごとの compare-and-swap
 *
 * 実装はすべての呼び出しを StoreUnavailable で失敗させうる。
 */
export interface LedgerStore {
	putChallenge(challenge: Challenge): Promise<void>,
	putHint(hint: Hint): Promise<void>,
	putTeam(team: Team): Promise<void>,
	putKothTarget(target: KothTarget): Promise<void>,

	getChallenge(id: string): Promise<Challenge | null>,
	getHint(id: string): Promise<Hint | null>,
	getTeam(id: string): Promise<Team | null>,
	getKothTarget(id: string): Promise<KothTarget | null>,
	listTeams(): Promise<Team[]>,
	listHints(challengeId: string): Promise<Hint[]>,
	listKothTargets(): Promise<KothTarget[]>,

	recordSubmission(draft: SubmissionDraft): Promise<RecordSubmissionResult>,
	insertHintUnlock(draft: HintUnlockDraft): Promise<HintUnlock | null>,
	compareAndSwapKoth(transition: KothTransition): Promise<KothTransitionResult>,

	listSubmissions(filter?: SubmissionFilter): Promise<Submission[]>,
	listHintUnlocks(filter?: HintUnlockFilter): Promise<HintUnlock[]>,
	listAccruals(filter?: AccrualFilter): Promise<KothAccrual[]>,
	openClaim(targetId: string): Promise<KothClaim | null>,
	listClaims(targetId: string): Promise<KothClaim[]>,

	close(): Promise<void>,
}

export type {
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
