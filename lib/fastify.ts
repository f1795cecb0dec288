import fastifyConstructor, {FastifyError, FastifyInstance, FastifyReply, FastifyRequest, FastifyServerOptions} from 'fastify';
import {isScoringError, StoreUnavailable, ValidationError} from './errors';
import logger from './logger';

const log = logger.child({bot: 'http'});

export const RETRY_AFTER_SECONDS = 1;

/**
 * 採点エラーを HTTP のレスポンスに変換するエラーハンドラ
 *
 * - ValidationError: 400 {result: 'invalid'}
 * - ForbiddenError: 403
 * - StoreUnavailable: 503 (Retry-After 付き)
 * - それ以外: 500
 */
export const scoringErrorHandler = (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
	if (error instanceof ValidationError) {
		reply.code(400).send({result: 'invalid', error: error.message});
		return;
	}
	if (error instanceof StoreUnavailable) {
		log.warn(`Ledger unavailable during ${request.method} ${request.url}: ${error.message}`);
		reply.code(503).header('Retry-After', String(RETRY_AFTER_SECONDS)).send({error: error.message, outcome: error.outcome});
		return;
	}
	if (isScoringError(error) && error.code === 'forbidden') {
		reply.code(403).send({error: error.message});
		return;
	}
	if ('validation' in error && error.validation !== undefined) {
		reply.code(400).send({result: 'invalid', error: error.message});
		return;
	}
	log.error(`Unhandled error during ${request.method} ${request.url}: ${error.stack ?? error.message}`);
	reply.code(500).send({error: 'Internal Server Error'});
};

/**
 * 単体テストに適した設定がなされたfastifyインスタンスを生成する
 *
 * @param opts fastifyConstructor に渡す引数
 * @example
 * import {fastifyDevConstructor} from '../lib/fastify';
 * import {server} from './index';
 *
 * const fastify = fastifyDevConstructor();
 * fastify.register(server(core));
 */
export const fastifyDevConstructor = (opts: FastifyServerOptions = {}): FastifyInstance => (
	// ログは winston 側の設定に任せ、テスト中は出さない
	fastifyConstructor({logger: false, ...opts})
);
