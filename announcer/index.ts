import {WebClient} from '@slack/web-api';
import type {ChatPostMessageArguments} from '@slack/web-api';
import logger from '../lib/logger';
import type {FirstBlood, KothTakeover, ScoreEventBus} from '../lib/scoreEvents';
import type {LedgerStore} from '../ledger/store';

const log = logger.child({bot: 'announcer'});

// the part of WebClient the announcer talks to
export interface SlackPoster {
	chat: {
		postMessage(options: ChatPostMessageArguments): Promise<unknown>,
	},
}

export interface AnnouncerOptions {
	events: ScoreEventBus,
	store: LedgerStore,
	slack: SlackPoster,
	channel: string,
}

/**
 * First blood と KOTH の奪取を Slack に流す。
 * 投稿の失敗はログに残すだけで、採点には影響しない。
 */
export class Announcer {
	#events: ScoreEventBus;
	#store: LedgerStore;
	#slack: SlackPoster;
	#channel: string;
	#unsubscribers: (() => void)[] = [];

	static create({token, channel, events, store}: {token: string, channel: string, events: ScoreEventBus, store: LedgerStore}) {
		return new Announcer({events, store, slack: new WebClient(token), channel});
	}

	constructor({events, store, slack, channel}: AnnouncerOptions) {
		this.#events = events;
		this.#store = store;
		this.#slack = slack;
		this.#channel = channel;
	}

	start() {
		if (this.#unsubscribers.length > 0) {
			return;
		}
		this.#unsubscribers.push(
			this.#events.on('first-blood', (notice) => this.announceFirstBlood(notice)),
			this.#events.on('koth-takeover', (notice) => this.announceTakeover(notice)),
		);
	}

	stop() {
		for (const unsubscribe of this.#unsubscribers.splice(0)) {
			unsubscribe();
		}
	}

	async announceFirstBlood({teamId, challengeId}: FirstBlood) {
		const [team, challenge] = await Promise.all([
			this.#store.getTeam(teamId),
			this.#store.getChallenge(challengeId),
		]);
		const teamName = team?.name ?? teamId;
		const title = challenge?.title ?? challengeId;
		await this.#post(`:drop_of_blood: *${teamName}* got the first blood on *${title}*!`);
	}

	async announceTakeover({targetId, teamId, previousTeamId}: KothTakeover) {
		const [target, team, previous] = await Promise.all([
			this.#store.getKothTarget(targetId),
			this.#store.getTeam(teamId),
			previousTeamId === null ? Promise.resolve(null) : this.#store.getTeam(previousTeamId),
		]);
		const targetName = target?.name ?? targetId;
		const teamName = team?.name ?? teamId;
		if (previousTeamId === null) {
			await this.#post(`:crown: *${teamName}* claimed *${targetName}*`);
			return;
		}
		await this.#post(`:crown: *${teamName}* took *${targetName}* from *${previous?.name ?? previousTeamId}*`);
	}

	async #post(text: string) {
		try {
			await this.#slack.chat.postMessage({
				channel: this.#channel,
				text,
				username: 'ctf-scoreboard',
				icon_emoji: ':triangular_flag_on_post:',
			});
		} catch (error) {
			log.error(`Failed to post to Slack: ${error instanceof Error ? error.message : String(error)}`);
		}
	}
}
