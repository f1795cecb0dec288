export type ScoringErrorCode =
	'validation' |
	'forbidden' |
	'store-unavailable' |
	'reconciliation-mismatch';

export abstract class ScoringError extends Error {
	abstract readonly code: ScoringErrorCode;

	constructor(message: string, options?: {cause?: unknown}) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Malformed or out-of-range input. Always raised before anything is written to the ledger.
 */
export class ValidationError extends ScoringError {
	readonly code = 'validation';
}

export class ForbiddenError extends ScoringError {
	readonly code = 'forbidden';
}

/**
 * The ledger could not complete a call. With outcome 'unknown' the write may or may not have
 * been committed, and the caller must not assume either.
 */
export class StoreUnavailable extends ScoringError {
	readonly code = 'store-unavailable';
	readonly outcome: 'failed' | 'unknown';

	constructor(message: string, outcome: 'failed' | 'unknown', options?: {cause?: unknown}) {
		super(message, options);
		this.outcome = outcome;
	}
}

export class ReconciliationMismatch extends ScoringError {
	readonly code = 'reconciliation-mismatch';
	readonly teamId: string;
	readonly incremental: number;
	readonly fromScratch: number;

	constructor(teamId: string, incremental: number, fromScratch: number, detail: string) {
		super(`Score drift on team ${teamId}: incremental ${incremental}, from-scratch ${fromScratch} (${detail})`);
		this.teamId = teamId;
		this.incremental = incremental;
		this.fromScratch = fromScratch;
	}
}

export const isScoringError = (error: unknown): error is ScoringError => error instanceof ScoringError;
