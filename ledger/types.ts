export interface Challenge {
	id: string,
	title: string,
	category: string,
	value: number,
	flag: string,
	caseSensitive: boolean,
	hidden: boolean,
	retired: boolean,
}

export interface Hint {
	id: string,
	challengeId: string,
	cost: number,
	rank: number,
	text: string,
}

export interface Team {
	id: string,
	name: string,
	members: string[],
	affiliation: string,
	registeredAt: Date,
}

export type CaptureRule = 'open' | 'proof';

export interface KothTarget {
	id: string,
	name: string,
	challengeId: string | null,
	captureRule: CaptureRule,
	proof: string,
	accrualPoints: number,
	accrualUnitMs: number,
}

// duplicate: the text matched the flag but the team already held the award
export type SubmissionOutcome = 'correct' | 'incorrect' | 'duplicate';

export interface Submission {
	id: string,
	teamId: string,
	challengeId: string,
	userId: string | null,
	text: string,
	submittedAt: Date,
	outcome: SubmissionOutcome,
	value: number,
}

export type SubmissionDraft = Omit<Submission, 'id'>;

export interface HintUnlock {
	id: string,
	teamId: string,
	hintId: string,
	challengeId: string,
	cost: number,
	unlockedAt: Date,
}

export type HintUnlockDraft = Omit<HintUnlock, 'id'>;

export interface KothClaim {
	id: string,
	targetId: string,
	teamId: string,
	claimedAt: Date,
	releasedAt: Date | null,
}

export interface KothAccrual {
	id: string,
	targetId: string,
	teamId: string,
	claimId: string,
	points: number,
	creditedAt: Date,
}

export interface SubmissionFilter {
	teamId?: string,
	challengeId?: string,
	outcome?: SubmissionOutcome,
}

export interface HintUnlockFilter {
	teamId?: string,
	challengeId?: string,
}

export interface AccrualFilter {
	teamId?: string,
	targetId?: string,
	claimId?: string,
}

/**
 * One atomic step on a KOTH target. The step applies only while the target's open claim is
 * still expectedClaimId (null meaning no open claim) and, when expectedCredited is given, the
 * points already credited to that claim still add up to it. Accrual, release and open are then
 * written together, in that order.
 */
export interface KothTransition {
	targetId: string,
	expectedClaimId: string | null,
	expectedCredited?: number,
	accrual?: {teamId: string, claimId: string, points: number, creditedAt: Date},
	release?: {at: Date},
	open?: {teamId: string, at: Date},
}

export type KothTransitionResult =
	{ok: true, claim: KothClaim | null, released: KothClaim | null, accrual: KothAccrual | null} |
	{ok: false, current: KothClaim | null};

export type RecordSubmissionResult =
	{awarded: true, submission: Submission} |
	{awarded: false, submission: Submission};
