import {ForbiddenError} from './errors';
import type {Team} from '../ledger/types';

export const roles = ['superadmin', 'editor', 'judge', 'player'] as const;
export type Role = (typeof roles)[number];

export type Capability =
	'submit-flag' |
	'unlock-hint' |
	'claim-koth' |
	'view-score' |
	'view-leaderboard' |
	'reconcile' |
	'close-competition' |
	'manage-catalog';

export interface Actor {
	userId: string,
	teamId: string | null,
	role: Role,
}

const playerCapabilities: Capability[] = ['submit-flag', 'unlock-hint', 'claim-koth', 'view-score', 'view-leaderboard'];

const capabilityTable: Record<Role, ReadonlySet<Capability>> = {
	superadmin: new Set<Capability>([
		...playerCapabilities,
		'reconcile',
		'close-competition',
		'manage-catalog',
	]),
	editor: new Set<Capability>(['view-score', 'view-leaderboard', 'manage-catalog']),
	judge: new Set<Capability>(['view-score', 'view-leaderboard', 'reconcile']),
	player: new Set<Capability>(playerCapabilities),
};

// these act on behalf of a team, so the actor has to be on its roster
const teamActions = new Set<Capability>(['submit-flag', 'unlock-hint', 'claim-koth']);

export const isRole = (value: unknown): value is Role => (
	typeof value === 'string' && roles.some((role) => role === value)
);

export const can = (role: Role, capability: Capability) => capabilityTable[role].has(capability);

export const authorize = (actor: Actor, capability: Capability, team?: Team | null) => {
	if (!can(actor.role, capability)) {
		throw new ForbiddenError(`Role ${actor.role} cannot ${capability}`);
	}
	if (actor.role !== 'player' || !teamActions.has(capability)) {
		return;
	}
	if (team === undefined || team === null || !team.members.includes(actor.userId)) {
		throw new ForbiddenError(`User ${actor.userId} is not a member of team ${team?.id ?? actor.teamId ?? '(none)'}`);
	}
};
