import {ManualClock} from '../lib/clock';
import {ValidationError} from '../lib/errors';
import {CompetitionWindow} from '.';

describe('CompetitionWindow', () => {
	const startsAt = new Date('2024-03-01T00:00:00Z');
	const endsAt = new Date('2024-03-02T00:00:00Z');

	it('moves from upcoming through running to finished', () => {
		const clock = new ManualClock('2024-02-29T23:59:59Z');
		const competition = new CompetitionWindow({startsAt, endsAt, clock});

		expect(competition.phase()).toBe('upcoming');
		clock.set(startsAt);
		expect(competition.phase()).toBe('running');
		expect(competition.isRunning()).toBe(true);
		clock.set(endsAt);
		expect(competition.phase()).toBe('finished');
	});

	it('is always running without a configured window', () => {
		const competition = new CompetitionWindow({startsAt: null, endsAt: null, clock: new ManualClock()});
		expect(competition.phase(new Date('1999-01-01T00:00:00Z'))).toBe('running');
	});

	it('explains why it refuses work', () => {
		const competition = new CompetitionWindow({startsAt, endsAt, clock: new ManualClock()});

		expect(() => competition.assertRunning(new Date('2024-02-01T00:00:00Z'))).toThrow('The competition has not started yet');
		expect(() => competition.assertRunning(new Date('2024-04-01T00:00:00Z'))).toThrow('The competition has ended');
		expect(() => competition.assertRunning(new Date('2024-03-01T12:00:00Z'))).not.toThrow();
	});

	it('can be finished early', () => {
		const competition = new CompetitionWindow({startsAt: null, endsAt: null, clock: new ManualClock()});
		competition.finish();
		expect(competition.phase()).toBe('finished');
	});

	it('rejects a window that ends before it starts', () => {
		expect(() => new CompetitionWindow({startsAt: endsAt, endsAt: startsAt, clock: new ManualClock()})).toThrow(ValidationError);
	});

	it('runs the end handler when the end time arrives', async () => {
		const competition = new CompetitionWindow({startsAt: null, endsAt: new Date(Date.now() + 50), clock: new ManualClock()});

		await new Promise<void>((resolve) => {
			competition.scheduleEnd(async () => {
				resolve();
			});
		});
	});

	it('does not schedule an end that has already passed', () => {
		const competition = new CompetitionWindow({startsAt: null, endsAt: new Date(Date.now() - 1000), clock: new ManualClock()});
		const onEnd = jest.fn(async () => {});

		competition.scheduleEnd(onEnd);
		competition.cancelSchedule();

		expect(onEnd).not.toHaveBeenCalled();
	});
});
