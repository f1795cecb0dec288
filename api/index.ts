import Fastify from 'fastify';
import type {FastifyInstance, FastifyRequest} from 'fastify';
import plugin from 'fastify-plugin';
import {z} from 'zod';
import {authorize, isRole} from '../lib/capabilities';
import type {Actor, Capability} from '../lib/capabilities';
import {ForbiddenError, ValidationError} from '../lib/errors';
import {scoringErrorHandler} from '../lib/fastify';
import logger from '../lib/logger';
import {loadCatalog, parseCatalog} from '../catalog';
import type {ScoringCore} from '../core';
import type {Team} from '../ledger/types';

const log = logger.child({bot: 'api'});

interface ChallengeRoute {
	Params: {
		challengeId: string,
	},
}

interface HintRoute {
	Params: {
		hintId: string,
	},
}

interface KothRoute {
	Params: {
		targetId: string,
	},
}

interface TeamRoute {
	Params: {
		teamId: string,
	},
}

const submissionBody = z.object({
	text: z.string(),
});

const claimBody = z.object({
	proof: z.string().nullable().optional(),
}).default({});

const parseBody = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T => {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		throw new ValidationError(`Malformed request body: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
	}
	return parsed.data;
};

const header = (request: FastifyRequest, name: string) => {
	const value = request.headers[name];
	return typeof value === 'string' && value !== '' ? value : null;
};

// 認証は前段のアプリケーションが済ませ、結果をヘッダで渡してくる
const actorOf = (request: FastifyRequest): Actor => {
	const userId = header(request, 'x-user');
	if (userId === null) {
		throw new ForbiddenError('Missing x-user header');
	}
	const role = header(request, 'x-role') ?? 'player';
	if (!isRole(role)) {
		throw new ForbiddenError(`Unknown role ${role}`);
	}
	return {userId, teamId: header(request, 'x-team'), role};
};

export const server = (core: ScoringCore) => plugin(async (fastify: FastifyInstance) => {
	fastify.setErrorHandler(scoringErrorHandler);

	// team actions run as the actor's team, which has to exist
	const actAsTeam = async (request: FastifyRequest, capability: Capability): Promise<Team> => {
		const actor = actorOf(request);
		if (actor.teamId === null) {
			authorize(actor, capability, null);
			throw new ValidationError('Missing x-team header');
		}
		const team = await core.store.getTeam(actor.teamId);
		authorize(actor, capability, team);
		if (team === null) {
			throw new ValidationError(`Unknown team ${actor.teamId}`);
		}
		return team;
	};

	fastify.post<ChallengeRoute>('/challenges/:challengeId/submissions', async (request) => {
		const team = await actAsTeam(request, 'submit-flag');
		const {text} = parseBody(submissionBody, request.body);
		const result = await core.submissions.submit({
			teamId: team.id,
			challengeId: request.params.challengeId,
			userId: actorOf(request).userId,
			text,
		});
		return {result};
	});

	fastify.post<HintRoute>('/hints/:hintId/unlock', async (request) => {
		const team = await actAsTeam(request, 'unlock-hint');
		const result = await core.hints.unlock({teamId: team.id, hintId: request.params.hintId});
		if (result.status === 'unlocked') {
			return {result: result.status, cost: result.cost, text: result.hint.text};
		}
		if (result.status === 'already-unlocked') {
			return {result: result.status, text: result.hint.text};
		}
		return {result: result.status, missingRank: result.missingRank};
	});

	fastify.post<KothRoute>('/koth/:targetId/claim', async (request, reply) => {
		const {koth} = core;
		if (koth === null) {
			reply.code(404);
			return {error: 'KOTH is not enabled'};
		}
		const team = await actAsTeam(request, 'claim-koth');
		const {proof} = parseBody(claimBody, request.body ?? {});
		const result = await koth.claim({teamId: team.id, targetId: request.params.targetId, proof});
		if (result.status === 'rejected') {
			return {result: result.status, reason: result.reason, owner: result.owner?.teamId ?? null};
		}
		return {result: result.status, owner: result.claim.teamId};
	});

	fastify.get<TeamRoute>('/teams/:teamId/score', async (request) => {
		authorize(actorOf(request), 'view-score');
		const {teamId} = request.params;
		const standing = await core.aggregator.standingOf(teamId);
		return {teamId, score: standing.score};
	});

	fastify.get('/leaderboard', async (request) => {
		authorize(actorOf(request), 'view-leaderboard');
		const entries = await core.leaderboard.rankedTeams();
		return {
			entries: entries.map(({teamId, teamName, score, rank}) => ({teamId, teamName, score, rank})),
		};
	});

	fastify.post('/admin/reconcile', async (request) => {
		authorize(actorOf(request), 'reconcile');
		const mismatches = await core.aggregator.reconcile();
		return {
			mismatches: mismatches.map(({teamId, incremental, fromScratch, message}) => ({teamId, incremental, fromScratch, message})),
		};
	});

	fastify.put('/admin/catalog', async (request) => {
		const actor = actorOf(request);
		authorize(actor, 'manage-catalog');
		const catalog = parseCatalog(request.body);
		await loadCatalog(core.store, catalog);
		log.info(`${actor.userId} updated the catalog`);
		return {
			challenges: catalog.challenges.length,
			hints: catalog.hints.length,
			teams: catalog.teams.length,
			kothTargets: catalog.kothTargets.length,
		};
	});

	fastify.post('/admin/close', async (request) => {
		const actor = actorOf(request);
		authorize(actor, 'close-competition');
		log.info(`${actor.userId} closed the competition`);
		const released = await core.close();
		return {released: released.length};
	});
});

export default async (core: ScoringCore, port: number) => {
	const fastify = Fastify({
		logger: logger.child({bot: 'http/api'}),
		pluginTimeout: 50000,
	});
	await fastify.register(server(core));

	const address = await fastify.listen({port, host: '0.0.0.0'});
	log.info(`API server launched at ${address}`);
	return fastify;
};
