import plugin from 'fastify-plugin';
import {FastifyInstance} from 'fastify';
import {ForbiddenError, ValidationError} from './errors';
import {fastifyDevConstructor, scoringErrorHandler} from './fastify';

describe('scoringErrorHandler', () => {
	let fastify: FastifyInstance;

	beforeEach(() => {
		fastify = fastifyDevConstructor();
		fastify.register(plugin(async (instance) => {
			instance.setErrorHandler(scoringErrorHandler);
			instance.get('/invalid', async () => {
				throw new ValidationError('Unknown challenge nope');
			});
			instance.get('/forbidden', async () => {
				throw new ForbiddenError('Role player cannot reconcile');
			});
			instance.get('/broken', async () => {
				throw new TypeError('Cannot read properties of undefined');
			});
			instance.post('/schema', {
				schema: {body: {type: 'object', required: ['text'], properties: {text: {type: 'string'}}}},
			}, async () => ({ok: true}));
		}));
	});

	afterEach(async () => {
		await fastify.close();
	});

	it('maps validation errors to 400 invalid', async () => {
		const response = await fastify.inject({method: 'GET', url: '/invalid'});
		expect(response.statusCode).toBe(400);
		expect(response.json()).toEqual({result: 'invalid', error: 'Unknown challenge nope'});
	});

	it('maps forbidden errors to 403', async () => {
		const response = await fastify.inject({method: 'GET', url: '/forbidden'});
		expect(response.statusCode).toBe(403);
		expect(response.json()).toEqual({error: 'Role player cannot reconcile'});
	});

	it('hides other errors behind a 500', async () => {
		const response = await fastify.inject({method: 'GET', url: '/broken'});
		expect(response.statusCode).toBe(500);
		expect(response.json()).toEqual({error: 'Internal Server Error'});
	});

	it('passes constructor options through to fastify', async () => {
		const caseInsensitive = fastifyDevConstructor({caseSensitive: false});
		caseInsensitive.register(plugin(async (instance) => {
			instance.setErrorHandler(scoringErrorHandler);
			instance.get('/invalid', async () => {
				throw new ValidationError('Unknown challenge nope');
			});
		}));

		const response = await caseInsensitive.inject({method: 'GET', url: '/INVALID'});
		expect(response.statusCode).toBe(400);
		await caseInsensitive.close();
	});

	it('answers request validation failures with invalid', async () => {
		const response = await fastify.inject({method: 'POST', url: '/schema', payload: {}});
		expect(response.statusCode).toBe(400);
		expect(response.json().result).toBe('invalid');
	});
});
