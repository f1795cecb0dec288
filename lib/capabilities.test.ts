import {teamOf} from '../ledger/fixtures';
import {authorize, can, isRole} from './capabilities';
import {ForbiddenError} from './errors';

describe('capabilities', () => {
	const team = teamOf('a', {members: ['alice', 'amane']});

	it('lets players act for their own team', () => {
		expect(() => authorize({userId: 'alice', teamId: 'a', role: 'player'}, 'submit-flag', team)).not.toThrow();
		expect(() => authorize({userId: 'amane', teamId: 'a', role: 'player'}, 'claim-koth', team)).not.toThrow();
	});

	it('stops players acting for a team they are not on', () => {
		expect(() => authorize({userId: 'bob', teamId: 'a', role: 'player'}, 'unlock-hint', team)).toThrow(ForbiddenError);
		expect(() => authorize({userId: 'bob', teamId: null, role: 'player'}, 'submit-flag', null)).toThrow('User bob is not a member of team (none)');
	});

	it('keeps administration away from players', () => {
		expect(() => authorize({userId: 'alice', teamId: 'a', role: 'player'}, 'reconcile')).toThrow('Role player cannot reconcile');
		expect(() => authorize({userId: 'alice', teamId: 'a', role: 'player'}, 'close-competition')).toThrow(ForbiddenError);
	});

	it('gives each staff role its own table', () => {
		expect(can('judge', 'reconcile')).toBe(true);
		expect(can('judge', 'close-competition')).toBe(false);
		expect(can('editor', 'manage-catalog')).toBe(true);
		expect(can('editor', 'submit-flag')).toBe(false);
		expect(can('superadmin', 'close-competition')).toBe(true);
	});

	it('lets a superadmin act for any team', () => {
		expect(() => authorize({userId: 'root', teamId: 'a', role: 'superadmin'}, 'submit-flag', team)).not.toThrow();
	});

	it('recognizes role names', () => {
		expect(isRole('judge')).toBe(true);
		expect(isRole('root')).toBe(false);
		expect(isRole(undefined)).toBe(false);
	});
});
