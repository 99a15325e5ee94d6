import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import type { ErrorResponse } from '../lib/wire.js';
import { scopedLogger } from '../lib/logger.js';
import { LookupService, type LookupSettings } from './lookup-service.js';
import healthRoutes from './routes/health.js';
import lookupRoutes from './routes/lookup.js';

const logger = scopedLogger('server');

export const buildServer = async (settings: LookupSettings): Promise<FastifyInstance> => {
	const app = Fastify({ logger: false });
	const lookupService = new LookupService(settings);

	app.setErrorHandler((error: FastifyError, request, reply) => {
		const isClientError = error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500;

		if (!isClientError) {
			logger.error(`${request.method} ${request.url} failed.`, error);
		}

		const body: ErrorResponse = {
			status: 'error',
			message: isClientError ? error.message : 'Internal server error.',
		};

		return reply.status(isClientError ? error.statusCode ?? 400 : 500).send(body);
	});

	app.setNotFoundHandler((request, reply) => {
		const body: ErrorResponse = { status: 'error', message: `Route ${request.method} ${request.url} not found.` };
		return reply.status(404).send(body);
	});

	app.addHook('onResponse', async (request, reply) => {
		logger.debug(`${request.method} ${request.url} ${reply.statusCode} ${Math.round(reply.elapsedTime)} ms.`);
	});

	await app.register(healthRoutes);
	await app.register(lookupRoutes, { lookupService });

	return app;
};
