import {prettyLine} from './logger';

describe('prettyLine', () => {
	const timestamp = new Date(2024, 0, 1, 12, 0, 3).toISOString();

	it('shows the module and the team and target a line is about', () => {
		expect(prettyLine({level: 'INFO', message: 'Team team-a captured hill', timestamp, bot: 'koth', teamId: 'team-a', targetId: 'hill'}))
			.toBe('[INFO] \x1b[90m12:00:03\x1b[0m \x1b[35m(koth)\x1b[0m [team-a → hill] Team team-a captured hill');
	});

	it('leaves out what the line does not carry', () => {
		expect(prettyLine({level: 'WARN', message: 'Competition end is already in the past', timestamp}))
			.toBe('[WARN] \x1b[90m12:00:03\x1b[0m Competition end is already in the past');
		expect(prettyLine({level: 'ERROR', message: 'Score drift on team team-b', timestamp, bot: 'scoring', teamId: 'team-b'}))
			.toBe('[ERROR] \x1b[90m12:00:03\x1b[0m \x1b[35m(scoring)\x1b[0m [team-b] Score drift on team team-b');
	});
});
