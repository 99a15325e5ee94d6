import * as fs from 'node:fs';
import process from 'node:process';
import Joi from 'joi';
import type { ClientConfig, ServerEndpoint } from '../types.js';
import { getConfValue } from '../lib/config.js';
import { scopedLogger } from '../lib/logger.js';
import { errorMessage, expandHome, parsePositiveInt } from '../lib/util.js';
import { ConfigError } from './exception/config-error.js';

const logger = scopedLogger('client-resolver');

export const SERVER_URL_ENV = 'IPTEST_SERVER_URL';
export const CONFIG_FILE_ENV = 'IPTEST_CONFIG_FILE';
export const TIMEOUT_ENV = 'IPTEST_TIMEOUT_SECONDS';

const clientConfigSchema = Joi.object<{ server_url: string }>({
	server_url: Joi.string().trim().min(1).required(),
}).unknown(true).required();

export type ResolveOptions = {
	env?: NodeJS.ProcessEnv;
	configPath?: string;
};

/**
 * Turns `host:port` or a full http(s) URL into a base URL without a trailing slash.
 * @throws {ConfigError}
 */
export const normalizeServerUrl = (value: string, source: string): string => {
	const trimmed = value.trim();
	const withScheme = trimmed.includes('://') ? trimmed : `http://${trimmed}`;
	let url: URL;

	try {
		url = new URL(withScheme);
	} catch {
		throw new ConfigError(source, `"${trimmed}" is not a valid URL`);
	}

	if (url.protocol !== 'http:' && url.protocol !== 'https:') {
		throw new ConfigError(source, `unsupported protocol "${url.protocol}"`);
	}

	return url.href.replace(/\/+$/, '');
};

/**
 * Reads the client configuration file. Returns `undefined` when the file does not exist.
 * @throws {ConfigError} when the file exists but is unreadable or malformed.
 */
export const loadClientConfig = (configPath: string): ClientConfig | undefined => {
	if (!fs.existsSync(configPath)) {
		return undefined;
	}

	let parsed: unknown;

	try {
		parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
	} catch (error: unknown) {
		throw new ConfigError(configPath, `could not parse the file: ${errorMessage(error)}`);
	}

	const validationResult = clientConfigSchema.validate(parsed);

	if (validationResult.error) {
		throw new ConfigError(configPath, validationResult.error.message);
	}

	return { serverUrl: normalizeServerUrl(validationResult.value.server_url, configPath) };
};

const resolveUrl = (env: NodeJS.ProcessEnv, configPath: string): string => {
	const envUrl = env[SERVER_URL_ENV]?.trim();

	if (envUrl) {
		try {
			return normalizeServerUrl(envUrl, SERVER_URL_ENV);
		} catch (error: unknown) {
			if (!(error instanceof ConfigError)) {
				throw error;
			}

			logger.warn(`Ignoring invalid server URL override. ${error.message}.`);
		}
	}

	try {
		const fileConfig = loadClientConfig(configPath);

		if (fileConfig) {
			return fileConfig.serverUrl;
		}
	} catch (error: unknown) {
		if (!(error instanceof ConfigError)) {
			throw error;
		}

		logger.warn(`Ignoring malformed client configuration. ${error.message}.`);
	}

	return normalizeServerUrl(getConfValue<string>('client.defaultUrl'), 'default');
};

/**
 * The client must wait longer than the server may spend probing.
 */
const resolveTimeout = (env: NodeJS.ProcessEnv): number => {
	const minimum = getConfValue<number>('server.requestTimeout') + 1000;
	const seconds = parsePositiveInt(env[TIMEOUT_ENV]);

	if (env[TIMEOUT_ENV] !== undefined && seconds === undefined) {
		logger.warn(`Ignoring ${TIMEOUT_ENV}="${env[TIMEOUT_ENV]}": not a positive integer.`);
	}

	const timeout = seconds !== undefined ? seconds * 1000 : getConfValue<number>('client.timeout');

	return Math.max(timeout, minimum);
};

/**
 * Determines the test server to talk to. The first source present wins:
 * the `IPTEST_SERVER_URL` environment variable, the client configuration
 * file, then the compiled-in loopback default. A malformed source is logged
 * and skipped.
 */
export const resolveEndpoint = ({ env = process.env, configPath }: ResolveOptions = {}): ServerEndpoint => {
	const filePath = configPath ?? expandHome(env[CONFIG_FILE_ENV]?.trim() || getConfValue<string>('client.configFile'));

	return Object.freeze({
		url: resolveUrl(env, filePath),
		timeout: resolveTimeout(env),
	});
};
