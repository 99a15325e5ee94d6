import type { ProbeAttempt, ProbeResult, Target } from '../types.js';
import { aggregate } from './aggregate.js';
import { probe, type ProbeDependencies, type ProbeOptions } from './tcp-probe.js';

export const runProbe = async (target: Target, options: ProbeOptions, deps: ProbeDependencies = {}): Promise<ProbeResult> => {
	const attempts: ProbeAttempt[] = [];
	let resolvedAddress: string | null = null;

	for await (const event of probe(target, options, deps)) {
		if (event.type === 'resolved') {
			resolvedAddress = event.address;
		} else {
			attempts.push(event.attempt);
		}
	}

	return aggregate(target.value, attempts, { resolvedAddress, port: options.port });
};
