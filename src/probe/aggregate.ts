import type { LatencyStats, ProbeAttempt, ProbeResult } from '../types.js';
import { roundNumber } from '../lib/util.js';

export type AggregateMeta = {
	resolvedAddress: string | null;
	port: number | null;
};

export const latencyStats = (attempts: readonly ProbeAttempt[]): LatencyStats | null => {
	const rtts = attempts.filter(attempt => attempt.outcome === 'success').map(attempt => attempt.elapsed);

	if (rtts.length === 0) {
		return null;
	}

	return Object.freeze({
		min: roundNumber(Math.min(...rtts)),
		avg: roundNumber(rtts.reduce((sum, rtt) => sum + rtt, 0) / rtts.length),
		max: roundNumber(Math.max(...rtts)),
	});
};

/**
 * Summarizes an ordered attempt sequence. Latency is computed over successful
 * attempts only and is `null` when none succeeded.
 */
export const aggregate = (target: string, attempts: readonly ProbeAttempt[], meta: AggregateMeta = { resolvedAddress: null, port: null }): ProbeResult => {
	const successCount = attempts.filter(attempt => attempt.outcome === 'success').length;
	const result: ProbeResult = {
		target,
		status: successCount > 0 ? 'reachable' : 'unreachable',
		attempts: Object.freeze([ ...attempts ]),
		successCount,
		latency: latencyStats(attempts),
		resolvedAddress: meta.resolvedAddress,
		port: meta.port,
	};

	return Object.freeze(result);
};

export const invalidTargetResult = (target: string, error: string): ProbeResult => {
	const result: ProbeResult = {
		target,
		status: 'invalid_target',
		attempts: Object.freeze([]),
		successCount: 0,
		latency: null,
		resolvedAddress: null,
		port: null,
		error,
	};

	return Object.freeze(result);
};
