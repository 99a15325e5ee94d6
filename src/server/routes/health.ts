import type { FastifyPluginAsync } from 'fastify';
import type { HealthResponse } from '../../lib/wire.js';
import { scopedLogger } from '../../lib/logger.js';
import { VERSION } from '../../constants.js';

const logger = scopedLogger('health');

const plugin: FastifyPluginAsync = async (fastify) => {
	fastify.get<{ Reply: HealthResponse }>('/health', async (request) => {
		logger.info(`Health check from ${request.ip} answered ok.`);
		return { status: 'ok', version: VERSION };
	});
};

export default plugin;
