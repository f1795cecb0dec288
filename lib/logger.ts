import winston from 'winston';
import {inspect} from 'util';
import type {FastifyLogFn} from 'fastify';

// fastify は fatal, trace, silent を要求するので winston の既定レベルに足しておく
const levels = {
	fatal: 0,
	error: 1,
	warn: 2,
	info: 3,
	http: 4,
	verbose: 5,
	debug: 6,
	silly: 7,
	trace: 8,
	silent: 9,
};

const gray = (text: string) => `\x1b[90m${text}\x1b[0m`;
const magenta = (text: string) => `\x1b[35m${text}\x1b[0m`;

/**
 * 開発用の1行表示。bot はモジュール名、teamId と targetId は採点イベントの対象。
 *
 * @example
 * [INFO] 12:00:03 (koth) [team-a → hill] Team team-a captured hill
 */
export const prettyLine = ({level, message, timestamp, bot, teamId, targetId}: winston.Logform.TransformableInfo) => {
	const time = typeof timestamp === 'string' ? new Date(timestamp) : new Date();
	const clock = [time.getHours(), time.getMinutes(), time.getSeconds()]
		.map((value) => value.toString().padStart(2, '0'))
		.join(':');

	const subject = [teamId, targetId].filter((value): value is string => typeof value === 'string');
	const parts = [
		`[${level}]`,
		gray(clock),
		...(typeof bot === 'string' ? [magenta(`(${bot})`)] : []),
		...(subject.length > 0 ? [`[${subject.join(' → ')}]`] : []),
		typeof message === 'string' ? message : inspect(message, {colors: true}),
	];
	return parts.join(' ');
};

const transport = () => {
	if (process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json') {
		return new winston.transports.Console();
	}
	return new winston.transports.Console({
		level: process.env.NODE_ENV === 'test' ? 'fatal' : 'debug',
		format: winston.format.combine(
			winston.format((info) => {
				info.level = info.level.toUpperCase();
				return info;
			})(),
			winston.format.colorize(),
			winston.format.printf(prettyLine),
		),
	});
};

const logger = winston.createLogger({
	level: process.env.LOG_LEVEL ?? 'info',
	levels,
	format: winston.format.combine(
		winston.format.timestamp(),
		winston.format.json(),
	),
	transports: [transport()],
});

export type ScoreboardLogger = winston.Logger & {
	fatal: FastifyLogFn,
	trace: FastifyLogFn,
	silent: FastifyLogFn,
	child(options: {bot: string}): ScoreboardLogger,
};

export default logger as ScoreboardLogger;
