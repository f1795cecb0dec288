import type {LedgerStore} from './store';
import type {Challenge, Hint, KothTarget, Team} from './types';

// Catalog entries for tests. Only the fields a test cares about need to be given.

export const challengeOf = (id: string, overrides: Partial<Challenge> = {}): Challenge => ({
	id,
	title: `Challenge ${id}`,
	category: 'misc',
	value: 100,
	flag: `FLAG{${id}}`,
	caseSensitive: false,
	hidden: false,
	retired: false,
	...overrides,
});

export const hintOf = (id: string, challengeId: string, overrides: Partial<Hint> = {}): Hint => ({
	id,
	challengeId,
	cost: 20,
	rank: 1,
	text: `Hint ${id}`,
	...overrides,
});

export const teamOf = (id: string, overrides: Partial<Team> = {}): Team => ({
	id,
	name: `Team ${id}`,
	members: [`${id}-player`],
	affiliation: '',
	registeredAt: new Date('2024-01-01T00:00:00Z'),
	...overrides,
});

export const kothTargetOf = (id: string, overrides: Partial<KothTarget> = {}): KothTarget => ({
	id,
	name: `Target ${id}`,
	challengeId: null,
	captureRule: 'open',
	proof: '',
	accrualPoints: 1,
	accrualUnitMs: 1000,
	...overrides,
});

export interface SeedOptions {
	challenges?: Challenge[],
	hints?: Hint[],
	teams?: Team[],
	kothTargets?: KothTarget[],
}

export const seedLedger = async <S extends LedgerStore>(store: S, {challenges = [], hints = [], teams = [], kothTargets = []}: SeedOptions): Promise<S> => {
	for (const challenge of challenges) {
		await store.putChallenge(challenge);
	}
	for (const hint of hints) {
		await store.putHint(hint);
	}
	for (const team of teams) {
		await store.putTeam(team);
	}
	for (const target of kothTargets) {
		await store.putKothTarget(target);
	}
	return store;
};
