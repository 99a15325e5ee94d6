import { Socket } from 'node:net';
import { performance } from 'node:perf_hooks';
import { setTimeout as setTimeoutAsync } from 'node:timers/promises';
import type { ProbeAttempt, ProbeOutcome, Target } from '../types.js';
import { errorMessage } from '../lib/util.js';
import { ProbeTransportError } from './exception/probe-transport-error.js';
import { lookupAddress, type LookupFunction, type ResolvedAddress } from './dns-resolver.js';

export type { LookupFunction, ResolvedAddress } from './dns-resolver.js';

export type ProbeOptions = {
	port: number;
	attempts: number;
	timeout: number;
	interval: number;
};

export type ConnectFunction = (
	address: string,
	port: number,
	family: 4 | 6,
	timeout: number,
	signal?: AbortSignal,
) => Promise<ProbeAttempt>;

export type ProbeDependencies = {
	lookup?: LookupFunction;
	connect?: ConnectFunction;
	signal?: AbortSignal;
};

export type ProbeEvent =
	| { type: 'resolved'; address: string; family: 4 | 6 }
	| { type: 'attempt'; attempt: ProbeAttempt };

const createAttempt = (outcome: ProbeOutcome, elapsed: number, timestamp: number, message?: string): ProbeAttempt => Object.freeze({
	outcome,
	elapsed: Math.max(0, elapsed),
	timestamp,
	...message ? { message } : {},
});

/**
 * Resolves a hostname once, bounded by `timeout` milliseconds.
 * @throws {ProbeTransportError}
 */
export const resolveHostname = async (hostname: string, timeout: number, lookup: LookupFunction = lookupAddress): Promise<ResolvedAddress> => {
	const controller = new AbortController();
	const deadline = setTimeoutAsync(timeout, undefined, { signal: controller.signal }).then(() => {
		throw new ProbeTransportError('timeout', `DNS resolution of ${hostname} timed out after ${timeout} ms`);
	});

	try {
		return await Promise.race([ lookup(hostname), deadline ]);
	} catch (error: unknown) {
		if (error instanceof ProbeTransportError) {
			throw error;
		}

		const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
		throw new ProbeTransportError('error', `DNS resolution of ${hostname} failed: ${errorMessage(error)}`, code);
	} finally {
		controller.abort();
	}
};

/**
 * Opens a single TCP connection and classifies how it ended.
 */
export const tcpConnect: ConnectFunction = (address, port, family, timeout, signal) => new Promise((resolve) => {
	const timestamp = Date.now();
	const startTime = performance.now();
	const socket = new Socket();
	let settled = false;

	const finish = (outcome: ProbeOutcome, message?: string) => {
		if (settled) {
			return;
		}

		settled = true;
		signal?.removeEventListener('abort', onAbort);
		socket.destroy();
		resolve(createAttempt(outcome, performance.now() - startTime, timestamp, message));
	};

	const onAbort = () => finish('timeout', 'request deadline exceeded');

	if (signal?.aborted) {
		finish('timeout', 'request deadline exceeded');
		return;
	}

	signal?.addEventListener('abort', onAbort, { once: true });

	socket.on('connect', () => finish('success'));
	socket.on('timeout', () => finish('timeout', `no response within ${timeout} ms`));

	socket.on('error', (error: NodeJS.ErrnoException) => {
		const transportError = new ProbeTransportError(error.code === 'ECONNREFUSED' ? 'refused' : 'error', error.message, error.code);
		finish(transportError.outcome, transportError.message);
	});

	socket.setNoDelay(true);
	socket.setTimeout(timeout);
	socket.connect({ port, host: address, family });
});

/**
 * Probes a validated target with sequential TCP connects.
 *
 * Hostnames are resolved once and the address is reused for every attempt.
 * When resolution fails, every attempt is reported as `error` (or `timeout`
 * when resolution ran out of time) and nothing is connected. Aborting `signal` records the in-flight attempt as `timeout`
 * and ends the sequence.
 */
export async function * probe (target: Target, options: ProbeOptions, deps: ProbeDependencies = {}): AsyncGenerator<ProbeEvent, void, undefined> {
	const { lookup = lookupAddress, connect = tcpConnect, signal } = deps;
	let resolved: ResolvedAddress;

	if (target.kind === 'ip') {
		resolved = { address: target.value, family: target.family };
	} else {
		const timestamp = Date.now();
		const startTime = performance.now();

		try {
			resolved = await resolveHostname(target.value, options.timeout, lookup);
		} catch (error: unknown) {
			const elapsed = performance.now() - startTime;
			const outcome = error instanceof ProbeTransportError ? error.outcome : 'error';

			for (let i = 0; i < options.attempts; i++) {
				yield { type: 'attempt', attempt: createAttempt(outcome, i === 0 ? elapsed : 0, timestamp, errorMessage(error)) };
			}

			return;
		}
	}

	yield { type: 'resolved', ...resolved };

	for (let i = 0; i < options.attempts; i++) {
		if (signal?.aborted) {
			return;
		}

		if (i > 0 && options.interval > 0) {
			try {
				await setTimeoutAsync(options.interval, undefined, { signal });
			} catch (error: unknown) {
				if (signal?.aborted) {
					return;
				}

				throw error;
			}
		}

		const attempt = await connect(resolved.address, options.port, resolved.family, options.timeout, signal);
		yield { type: 'attempt', attempt };
	}
}
