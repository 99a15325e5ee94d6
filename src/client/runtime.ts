import got, { HTTPError, ParseError, RequestError, TimeoutError } from 'got';
import type { ProbeStatus, ServerEndpoint } from '../types.js';
import { lookupResponseSchema, type LookupRequest, type LookupResponse } from '../lib/wire.js';
import { getConfValue } from '../lib/config.js';
import { scopedLogger } from '../lib/logger.js';
import { ServiceUnreachableError } from './exception/service-unreachable-error.js';
import { ServiceResponseError } from './exception/service-response-error.js';
import { renderLookup, renderServiceFault, renderServiceUnreachable } from './render.js';

const logger = scopedLogger('client');

export const ExitCode = {
	Reachable: 0,
	Failure: 1,
	Unreachable: 2,
	InvalidTarget: 3,
	ServiceUnreachable: 4,
} as const;

export type ExitCodeValue = typeof ExitCode[keyof typeof ExitCode];

export type RunOptions = {
	port?: number;
	attempts?: number;
	json?: boolean;
};

export type RunResult = {
	exitCode: ExitCodeValue;
	output: string;
	isError: boolean;
};

export const exitCodeFor = (status: ProbeStatus): ExitCodeValue => {
	switch (status) {
		case 'reachable':
			return ExitCode.Reachable;
		case 'unreachable':
			return ExitCode.Unreachable;
		case 'invalid_target':
			return ExitCode.InvalidTarget;
	}
};

/**
 * Sends one lookup request and validates the response payload.
 * @throws {ServiceUnreachableError} when the server cannot be reached at all.
 * @throws {ServiceResponseError} when the server answers with an error or a malformed payload.
 */
export const requestLookup = async (endpoint: ServerEndpoint, request: LookupRequest): Promise<LookupResponse> => {
	let payload: unknown;

	try {
		payload = await got.post(`${endpoint.url}/lookup`, {
			json: request,
			timeout: { request: endpoint.timeout },
			retry: { limit: 0 },
		}).json<unknown>();
	} catch (error: unknown) {
		if (error instanceof TimeoutError) {
			throw new ServiceUnreachableError(endpoint.url, `request timed out after ${endpoint.timeout} ms`);
		} else if (error instanceof HTTPError) {
			throw new ServiceResponseError(endpoint.url, `HTTP ${error.response.statusCode}${describeErrorBody(error.response.body)}`);
		} else if (error instanceof ParseError) {
			throw new ServiceResponseError(endpoint.url, 'response is not valid JSON');
		} else if (error instanceof RequestError) {
			throw new ServiceUnreachableError(endpoint.url, error.code ? `${error.code} (${error.message})` : error.message);
		}

		throw error;
	}

	const validationResult = lookupResponseSchema.validate(payload);

	if (validationResult.error) {
		throw new ServiceResponseError(endpoint.url, `malformed response: ${validationResult.error.message}`);
	}

	return validationResult.value;
};

function describeErrorBody (body: unknown): string {
	const text = Buffer.isBuffer(body) ? body.toString() : body;
	let parsed: unknown = text;

	if (typeof text === 'string') {
		try {
			parsed = JSON.parse(text);
		} catch (error: unknown) {
			logger.debug('Error response body is not JSON.', error);
			return '';
		}
	}

	if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
		return `: ${parsed.message}`;
	}

	return '';
}

/**
 * Runs one lookup against `endpoint` and renders the outcome. Never throws for
 * network failures; they map to `ExitCode.ServiceUnreachable`.
 */
export const run = async (rawTarget: string | undefined, endpoint: ServerEndpoint, options: RunOptions = {}): Promise<RunResult> => {
	const target = rawTarget ?? getConfValue<string>('client.defaultTarget');
	const request: LookupRequest = {
		target,
		...options.port !== undefined ? { port: options.port } : {},
		...options.attempts !== undefined ? { attempts: options.attempts } : {},
	};

	logger.debug(`Sending lookup of "${target}" to ${endpoint.url}.`);

	try {
		const response = await requestLookup(endpoint, request);

		return {
			exitCode: exitCodeFor(response.status),
			output: options.json ? JSON.stringify(response, null, 2) : renderLookup(response),
			isError: false,
		};
	} catch (error: unknown) {
		if (error instanceof ServiceUnreachableError) {
			return { exitCode: ExitCode.ServiceUnreachable, output: renderServiceUnreachable(error.url, error.message), isError: true };
		} else if (error instanceof ServiceResponseError) {
			return { exitCode: ExitCode.Failure, output: renderServiceFault(error.url, error.message), isError: true };
		}

		throw error;
	}
};
