import {EventEmitter} from 'events';
import logger from './logger';

const log = logger.child({bot: 'scoreEvents'});

interface ScoreChangeBase {
	// id of the ledger row that carries the change
	id: string,
	teamId: string,
	delta: number,
	at: Date,
}

export interface SolveScored extends ScoreChangeBase {
	kind: 'solve',
	challengeId: string,
}

export interface HintDeducted extends ScoreChangeBase {
	kind: 'hint',
	hintId: string,
	challengeId: string,
}

export interface KothAccrued extends ScoreChangeBase {
	kind: 'koth',
	targetId: string,
}

export type ScoreChanged = SolveScored | HintDeducted | KothAccrued;

export interface FirstBlood {
	teamId: string,
	challengeId: string,
	at: Date,
}

export interface KothTakeover {
	targetId: string,
	teamId: string,
	previousTeamId: string | null,
	at: Date,
}

interface ScoreEventMap {
	'score-changed': [ScoreChanged],
	'first-blood': [FirstBlood],
	'koth-takeover': [KothTakeover],
}

type Listener<K extends keyof ScoreEventMap> = (...args: ScoreEventMap[K]) => void | Promise<void>;

/**
 * スコアに関わるイベントを購読者に配送するバス。
 *
 * emit は台帳への書き込みが完了した後にだけ呼ばれる。購読者の処理は発行元を待たせず、
 * 非同期の購読者が失敗してもログに残すだけで発行元には伝播しない。
 */
export class ScoreEventBus {
	#emitter = new EventEmitter();

	constructor() {
		this.#emitter.setMaxListeners(50);
	}

	on<K extends keyof ScoreEventMap>(event: K, listener: Listener<K>) {
		const wrapped = (...args: ScoreEventMap[K]) => {
			try {
				const result = listener(...args);
				if (result instanceof Promise) {
					result.catch((error: unknown) => {
						log.error(`Listener for ${event} failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
					});
				}
			} catch (error) {
				log.error(`Listener for ${event} threw: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
			}
		};
		this.#emitter.on(event, wrapped);
		return () => {
			this.#emitter.off(event, wrapped);
		};
	}

	emit<K extends keyof ScoreEventMap>(event: K, ...args: ScoreEventMap[K]) {
		this.#emitter.emit(event, ...args);
	}

	removeAllListeners() {
		this.#emitter.removeAllListeners();
	}
}
