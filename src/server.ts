#!/usr/bin/env node
import dns from 'node:dns';
import process from 'node:process';
import { parseArgs } from 'node:util';
import { getConfValue } from './lib/config.js';
import { scopedLogger } from './lib/logger.js';
import { parsePositiveInt } from './lib/util.js';
import type { ProbeOptions } from './probe/tcp-probe.js';
import { buildServer } from './server/app.js';
import { VERSION } from './constants.js';

dns.setDefaultResultOrder('ipv4first');

const logger = scopedLogger('general');

const { values: args } = parseArgs({
	options: {
		host: { type: 'string', default: getConfValue<string>('server.host') },
		port: { type: 'string', default: String(getConfValue<number>('server.port')) },
	},
});

const port = parsePositiveInt(args.port);

if (port === undefined || port > 65535) {
	logger.error(`Invalid port "${args.port}".`);
	process.exit(1);
}

const probeOptions: ProbeOptions = {
	port: getConfValue<number>('probe.port'),
	attempts: getConfValue<number>('probe.attempts'),
	timeout: getConfValue<number>('probe.timeout'),
	interval: getConfValue<number>('probe.interval'),
};

const app = await buildServer({ probe: probeOptions, requestTimeout: getConfValue<number>('server.requestTimeout') });

const shutdown = (signal: string) => {
	logger.info(`${signal} received. Closing the server.`);

	app.close().then(() => {
		process.exit(0);
	}).catch((error: unknown) => {
		logger.error('Failed to close the server.', error);
		process.exit(1);
	});
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

try {
	const address = await app.listen({ host: args.host, port });
	logger.info(`Starting iptest server version ${VERSION} on ${address} in a ${process.env['NODE_ENV'] ?? 'production'} mode.`);
} catch (error: unknown) {
	logger.error('Failed to start the server.', error);
	process.exit(1);
}
