import fs from 'fs-extra';
import {z} from 'zod';
import {ValidationError} from '../lib/errors';
import logger from '../lib/logger';
import type {LedgerStore} from '../ledger/store';
import type {Challenge, Hint, KothTarget, Team} from '../ledger/types';

const log = logger.child({bot: 'catalog'});

const id = z.string().min(1).max(64).regex(/^[\w-]+$/);
const points = z.number().int().nonnegative();

const challengeSchema = z.object({
	id,
	title: z.string().min(1),
	category: z.string().default('misc'),
	value: points,
	flag: z.string().min(1).max(255),
	caseSensitive: z.boolean().default(false),
	hidden: z.boolean().default(false),
	retired: z.boolean().default(false),
});

const hintSchema = z.object({
	id,
	challengeId: id,
	cost: points,
	rank: z.number().int().nonnegative(),
	text: z.string().default(''),
});

const teamSchema = z.object({
	id,
	name: z.string().min(1),
	members: z.array(z.string().min(1)).default([]),
	affiliation: z.string().default(''),
	registeredAt: z.string().datetime({offset: true}).transform((value) => new Date(value))
		.default('1970-01-01T00:00:00Z'),
});

const kothTargetSchema = z.object({
	id,
	name: z.string().min(1),
	challengeId: id.nullable().default(null),
	captureRule: z.enum(['open', 'proof']).default('open'),
	proof: z.string().default(''),
	accrualPoints: z.number().int().positive(),
	accrualUnitMs: z.number().int().positive(),
}).refine(
	(target) => target.captureRule !== 'proof' || target.proof.trim() !== '',
	{message: 'A proof-guarded target needs a proof', path: ['proof']},
);

export const catalogSchema = z.object({
	challenges: z.array(challengeSchema).default([]),
	hints: z.array(hintSchema).default([]),
	teams: z.array(teamSchema).default([]),
	kothTargets: z.array(kothTargetSchema).default([]),
});

export interface Catalog {
	challenges: Challenge[],
	hints: Hint[],
	teams: Team[],
	kothTargets: KothTarget[],
}

const findDuplicate = (ids: string[]) => ids.find((value, index) => ids.indexOf(value) !== index);

export const parseCatalog = (data: unknown): Catalog => {
	const parsed = catalogSchema.safeParse(data);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
		throw new ValidationError(`Invalid catalog: ${issues.join(', ')}`);
	}
	const catalog = parsed.data;

	const idLists: [string, string[]][] = [
		['challenge', catalog.challenges.map((challenge) => challenge.id)],
		['hint', catalog.hints.map((hint) => hint.id)],
		['team', catalog.teams.map((team) => team.id)],
		['KOTH target', catalog.kothTargets.map((target) => target.id)],
	];
	for (const [kind, ids] of idLists) {
		const duplicate = findDuplicate(ids);
		if (duplicate !== undefined) {
			throw new ValidationError(`Invalid catalog: duplicate ${kind} ${duplicate}`);
		}
	}

	const challengeIds = new Set(catalog.challenges.map((challenge) => challenge.id));
	for (const hint of catalog.hints) {
		if (!challengeIds.has(hint.challengeId)) {
			throw new ValidationError(`Invalid catalog: hint ${hint.id} refers to unknown challenge ${hint.challengeId}`);
		}
	}
	for (const target of catalog.kothTargets) {
		if (target.challengeId !== null && !challengeIds.has(target.challengeId)) {
			throw new ValidationError(`Invalid catalog: KOTH target ${target.id} refers to unknown challenge ${target.challengeId}`);
		}
	}

	return catalog;
};

export const loadCatalog = async (store: LedgerStore, catalog: Catalog) => {
	for (const challenge of catalog.challenges) {
		await store.putChallenge(challenge);
	}
	for (const hint of catalog.hints) {
		await store.putHint(hint);
	}
	for (const team of catalog.teams) {
		await store.putTeam(team);
	}
	for (const target of catalog.kothTargets) {
		await store.putKothTarget(target);
	}
	log.info(`Loaded ${catalog.challenges.length} challenges, ${catalog.hints.length} hints, ${catalog.teams.length} teams and ${catalog.kothTargets.length} KOTH targets`);
};

export const readCatalog = async (catalogPath: string): Promise<Catalog> => {
	if (!await fs.pathExists(catalogPath)) {
		throw new ValidationError(`Catalog ${catalogPath} does not exist`);
	}
	let data: unknown;
	try {
		data = await fs.readJson(catalogPath);
	} catch (error) {
		throw new ValidationError(`Catalog ${catalogPath} is not valid JSON`, {cause: error});
	}
	return parseCatalog(data);
};
