import process from 'node:process';
import { parseArgs } from 'node:util';
import { getConfValue } from '../lib/config.js';
import { errorMessage, parsePositiveInt } from '../lib/util.js';
import { resolveEndpoint } from './resolver.js';
import { ExitCode, run, type RunOptions, type RunResult } from './runtime.js';

export const USAGE = `Usage: iptest [target] [--port <port>] [--attempts <count>] [--json]

Checks whether <target> (an IP address or hostname) accepts TCP connections,
as seen from the iptest server. Without a target, ${getConfValue<string>('client.defaultTarget')} is tested.

Environment:
  IPTEST_SERVER_URL       test server base URL
  IPTEST_CONFIG_FILE      client configuration file (JSON with "server_url")
  IPTEST_TIMEOUT_SECONDS  overall request timeout

Exit codes: 0 reachable, 2 unreachable, 3 invalid target, 4 server unreachable, 1 other failures.`;

const usageError = (message: string): RunResult => ({ exitCode: ExitCode.Failure, output: `${message}\n\n${USAGE}`, isError: true });

/**
 * Parses the command line, resolves the server and runs one lookup.
 */
export const main = async (argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<RunResult> => {
	let parsed;

	try {
		parsed = parseArgs({
			args: argv,
			allowPositionals: true,
			options: {
				port: { type: 'string', short: 'p' },
				attempts: { type: 'string', short: 'c' },
				json: { type: 'boolean', default: false },
				help: { type: 'boolean', short: 'h', default: false },
			},
		});
	} catch (error: unknown) {
		return usageError(errorMessage(error));
	}

	const { values, positionals } = parsed;

	if (values.help) {
		return { exitCode: ExitCode.Reachable, output: USAGE, isError: false };
	}

	if (positionals.length > 1) {
		return usageError('Only one target can be tested at a time.');
	}

	const options: RunOptions = { json: values.json === true };

	if (values.port !== undefined) {
		const port = parsePositiveInt(values.port);

		if (port === undefined || port > 65535) {
			return usageError(`Invalid port "${values.port}".`);
		}

		options.port = port;
	}

	if (values.attempts !== undefined) {
		const attempts = parsePositiveInt(values.attempts);
		const maxAttempts = getConfValue<number>('probe.maxAttempts');

		if (attempts === undefined || attempts > maxAttempts) {
			return usageError(`Invalid attempt count "${values.attempts}", expected 1 to ${maxAttempts}.`);
		}

		options.attempts = attempts;
	}

	const endpoint = resolveEndpoint({ env });

	return run(positionals[0], endpoint, options);
};
