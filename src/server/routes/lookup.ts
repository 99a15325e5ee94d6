import { performance } from 'node:perf_hooks';
import type { FastifyPluginAsync } from 'fastify';
import { lookupRequestSchema, toWireResult, type ErrorResponse, type LookupResponse } from '../../lib/wire.js';
import { scopedLogger } from '../../lib/logger.js';
import type { LookupService } from '../lookup-service.js';

const logger = scopedLogger('lookup');

export type LookupRouteOptions = {
	lookupService: LookupService;
};

const plugin: FastifyPluginAsync<LookupRouteOptions> = async (fastify, { lookupService }) => {
	fastify.post<{ Body: unknown; Reply: LookupResponse | ErrorResponse }>('/lookup', async (request, reply) => {
		const validationResult = lookupRequestSchema.validate(request.body);

		if (validationResult.error) {
			return reply.status(400).send({ status: 'error', message: `invalid request: ${validationResult.error.message}` });
		}

		const { target, port, attempts } = validationResult.value;
		const startTime = performance.now();
		const result = await lookupService.lookup(target, {
			...port !== undefined ? { port } : {},
			...attempts !== undefined ? { attempts } : {},
		});

		logger.info(`Lookup of "${result.target}" from ${request.ip} finished as ${result.status} (${result.successCount}/${result.attempts.length}) in ${Math.round(performance.now() - startTime)} ms.`);

		return toWireResult(result);
	});
};

export default plugin;
