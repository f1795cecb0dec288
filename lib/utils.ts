import type {ScoreboardLogger} from './logger';

export class Deferred<T> {
	promise: Promise<T>;
	isResolved: boolean;
	isRejected: boolean;
	private nativeReject: (reason?: unknown) => void = () => {};
	private nativeResolve: (value: T) => void = () => {};

	constructor() {
		this.promise = new Promise<T>((resolve, reject) => {
			this.nativeReject = reject;
			this.nativeResolve = resolve;
		});
		this.isResolved = false;
		this.isRejected = false;
	}

	resolve(value: T) {
		this.nativeResolve(value);
		this.isResolved = true;
		return this.promise;
	}

	reject(reason?: unknown) {
		this.nativeReject(reason);
		this.isRejected = true;
		return this.promise;
	}
}

/**
 * 非同期処理 task をコンストラクタ引数にとり、run() を呼ぶと task の返り値を返すクラス。
 * 実行中に run() が再度呼ばれた場合は新たに task を起動せず、実行中の結果を共有する。
 */
export class Coalescer<T> {
	private readonly task: () => Promise<T>;
	private inFlight: Promise<T> | null = null;

	constructor(task: () => Promise<T>) {
		this.task = task;
	}

	get isRunning() {
		return this.inFlight !== null;
	}

	run(): Promise<T> {
		if (this.inFlight !== null) {
			return this.inFlight;
		}
		const deferred = new Deferred<T>();
		this.inFlight = deferred.promise;
		this.task().then((value) => {
			this.inFlight = null;
			deferred.resolve(value);
		}, (error: unknown) => {
			this.inFlight = null;
			deferred.reject(error);
		});
		return deferred.promise;
	}
}

/**
 * Runs a side effect without making the caller wait for it. Rejections end up in the log.
 */
export const detach = (promise: Promise<unknown>, log: ScoreboardLogger, label: string) => {
	promise.catch((error: unknown) => {
		log.error(`${label} failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
	});
};
