import {StoreUnavailable} from '../lib/errors';

/**
 * Bounds a ledger call that has already been sent. When the deadline passes first, the call
 * may still commit, so the failure is reported with outcome 'unknown'.
 */
export const withDeadline = <T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> => (
	new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(new StoreUnavailable(`Ledger call ${operation} did not finish within ${timeoutMs}ms`, 'unknown'));
		}, timeoutMs);
		work.then((value) => {
			clearTimeout(timer);
			resolve(value);
		}, (error: unknown) => {
			clearTimeout(timer);
			reject(error instanceof StoreUnavailable ? error : new StoreUnavailable(`Ledger call ${operation} failed`, 'failed', {cause: error}));
		});
	})
);
