import type {Clock} from '../lib/clock';
import {ValidationError} from '../lib/errors';
import logger from '../lib/logger';
import type {ScoreEventBus} from '../lib/scoreEvents';
import {detach} from '../lib/utils';
import type {CompetitionWindow} from '../competition';
import type {LedgerStore} from '../ledger/store';
import type {Challenge, Team} from '../ledger/types';
import {matchesFlag} from './flag';

const log = logger.child({bot: 'submissions'});

export const MAX_FLAG_LENGTH = 255;

export type SubmitResult = 'accepted' | 'already-solved' | 'incorrect';

export interface SubmitRequest {
	teamId: string,
	challengeId: string,
	userId?: string | null,
	text: string,
}

export interface ChallengeStats {
	challengeId: string,
	solves: number,
	attempts: number,
}

export interface SubmissionValidatorOptions {
	store: LedgerStore,
	events: ScoreEventBus,
	clock: Clock,
	competition: CompetitionWindow,
}

/**
 * フラグの提出を受け付ける。
 *
 * 正解の判定はここで行うが、得点の付与を決めるのは台帳の条件付き挿入。
 * 同じチームの2人が同時に正解しても、挿入に勝った1件だけが accepted になり、もう一方は already-solved になる。
 * 提出はすべて台帳に記録する。
 */
export class SubmissionValidator {
	#store: LedgerStore;
	#events: ScoreEventBus;
	#clock: Clock;
	#competition: CompetitionWindow;
	#firstBloods = new Set<string>();

	constructor({store, events, clock, competition}: SubmissionValidatorOptions) {
		this.#store = store;
		this.#events = events;
		this.#clock = clock;
		this.#competition = competition;
	}

	async submit({teamId, challengeId, userId = null, text}: SubmitRequest): Promise<SubmitResult> {
		if (text.trim() === '') {
			throw new ValidationError('Flag must not be empty');
		}
		if (text.length > MAX_FLAG_LENGTH) {
			throw new ValidationError(`Flag must be at most ${MAX_FLAG_LENGTH} characters`);
		}

		const now = this.#clock.now();
		this.#competition.assertRunning(now);

		const [team, challenge] = await Promise.all([
			this.#store.getTeam(teamId),
			this.#store.getChallenge(challengeId),
		]);
		const target = this.#assertSubmittable(teamId, team, challengeId, challenge);

		const isCorrect = matchesFlag(text, target.flag, {caseSensitive: target.caseSensitive});
		const result = await this.#store.recordSubmission({
			teamId,
			challengeId,
			userId,
			text,
			submittedAt: now,
			outcome: isCorrect ? 'correct' : 'incorrect',
			value: isCorrect ? target.value : 0,
		});

		if (!isCorrect) {
			log.debug(`Team ${teamId} submitted a wrong flag for ${challengeId}`);
			return 'incorrect';
		}

		if (!result.awarded) {
			log.debug(`Team ${teamId} resubmitted the flag of ${challengeId}`);
			return 'already-solved';
		}

		const {submission} = result;
		log.info(`Team ${teamId} solved ${challengeId} for ${submission.value} points`);
		this.#events.emit('score-changed', {
			kind: 'solve',
			id: submission.id,
			teamId,
			challengeId,
			delta: submission.value,
			at: submission.submittedAt,
		});
		detach(this.#announceFirstBlood(challengeId, submission.id), log, `First blood check on ${challengeId}`);

		return 'accepted';
	}

	async statsOf(challengeId: string): Promise<ChallengeStats> {
		const submissions = await this.#store.listSubmissions({challengeId});
		return {
			challengeId,
			solves: submissions.filter((submission) => submission.outcome === 'correct').length,
			attempts: submissions.length,
		};
	}

	#assertSubmittable(teamId: string, team: Team | null, challengeId: string, challenge: Challenge | null) {
		if (team === null) {
			throw new ValidationError(`Unknown team ${teamId}`);
		}
		if (challenge === null || challenge.hidden) {
			throw new ValidationError(`Unknown challenge ${challengeId}`);
		}
		if (challenge.retired) {
			throw new ValidationError(`Challenge ${challengeId} is retired`);
		}
		return challenge;
	}

	async #announceFirstBlood(challengeId: string, submissionId: string) {
		if (this.#firstBloods.has(challengeId)) {
			return;
		}
		const [first] = await this.#store.listSubmissions({challengeId, outcome: 'correct'});
		if (first === undefined || first.id !== submissionId || this.#firstBloods.has(challengeId)) {
			return;
		}
		this.#firstBloods.add(challengeId);
		this.#events.emit('first-blood', {
			teamId: first.teamId,
			challengeId,
			at: first.submittedAt,
		});
	}
}
