import {scheduleJob, type Job} from 'node-schedule';
import type {Clock} from '../lib/clock';
import {ValidationError} from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child({bot: 'competition'});

export type CompetitionPhase = 'upcoming' | 'running' | 'finished';

export interface CompetitionWindowOptions {
	startsAt: Date | null,
	endsAt: Date | null,
	clock: Clock,
}

export class CompetitionWindow {
	readonly startsAt: Date | null;
	readonly endsAt: Date | null;
	#clock: Clock;
	#endJob: Job | null = null;
	#closedEarly = false;

	constructor({startsAt, endsAt, clock}: CompetitionWindowOptions) {
		if (startsAt !== null && endsAt !== null && startsAt.getTime() >= endsAt.getTime()) {
			throw new ValidationError('Competition must end after it starts');
		}
		this.startsAt = startsAt;
		this.endsAt = endsAt;
		this.#clock = clock;
	}

	phase(at: Date = this.#clock.now()): CompetitionPhase {
		if (this.#closedEarly) {
			return 'finished';
		}
		if (this.startsAt !== null && at.getTime() < this.startsAt.getTime()) {
			return 'upcoming';
		}
		if (this.endsAt !== null && at.getTime() >= this.endsAt.getTime()) {
			return 'finished';
		}
		return 'running';
	}

	isRunning(at: Date = this.#clock.now()) {
		return this.phase(at) === 'running';
	}

	assertRunning(at: Date = this.#clock.now()) {
		const phase = this.phase(at);
		if (phase === 'upcoming') {
			throw new ValidationError('The competition has not started yet');
		}
		if (phase === 'finished') {
			throw new ValidationError('The competition has ended');
		}
	}

	/**
	 * Ends the competition now, regardless of the configured end time.
	 */
	finish() {
		this.#closedEarly = true;
		this.#endJob?.cancel();
		this.#endJob = null;
	}

	/**
	 * Runs onEnd once when the configured end time arrives. Without an end time nothing is scheduled.
	 */
	scheduleEnd(onEnd: () => Promise<void>) {
		if (this.endsAt === null || this.#endJob !== null) {
			return;
		}
		const endsAt = this.endsAt;
		this.#endJob = scheduleJob(endsAt, async () => {
			this.#endJob = null;
			log.info(`Competition ended at ${endsAt.toISOString()}`);
			try {
				await onEnd();
			} catch (error) {
				log.error(`Closing the competition failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
			}
		});
		if (this.#endJob === null) {
			log.warn(`Competition end ${endsAt.toISOString()} is already in the past`);
		}
	}

	cancelSchedule() {
		this.#endJob?.cancel();
		this.#endJob = null;
	}
}
