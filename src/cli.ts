#!/usr/bin/env node
import process from 'node:process';
import { main } from './client/cli.js';
import { scopedLogger } from './lib/logger.js';

const logger = scopedLogger('general');

try {
	const result = await main(process.argv.slice(2));
	(result.isError ? process.stderr : process.stdout).write(`${result.output}\n`);
	process.exitCode = result.exitCode;
} catch (error: unknown) {
	logger.error('Unexpected failure.', error);
	process.exitCode = 1;
}
