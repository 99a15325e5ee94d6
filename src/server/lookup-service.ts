import type { ProbeResult, Target } from '../types.js';
import { scopedLogger } from '../lib/logger.js';
import { validateTarget } from '../probe/target-validator.js';
import { InvalidTargetError } from '../probe/exception/invalid-target-error.js';
import { invalidTargetResult } from '../probe/aggregate.js';
import { runProbe } from '../probe/run-probe.js';
import type { ConnectFunction, LookupFunction, ProbeOptions } from '../probe/tcp-probe.js';

const logger = scopedLogger('lookup-service');

export type LookupSettings = {
	probe: ProbeOptions;
	/** Deadline for the whole probe sequence of one request, in milliseconds. */
	requestTimeout: number;
	lookup?: LookupFunction;
	connect?: ConnectFunction;
};

export type LookupOverrides = {
	port?: number;
	attempts?: number;
};

export class LookupService {
	constructor (private readonly settings: LookupSettings) {}

	async lookup (rawTarget: string, overrides: LookupOverrides = {}): Promise<ProbeResult> {
		let target: Target;

		try {
			target = validateTarget(rawTarget);
		} catch (error: unknown) {
			if (error instanceof InvalidTargetError) {
				logger.debug(`Rejected target "${error.target}": ${error.message}.`);
				return invalidTargetResult(error.target, error.message);
			}

			throw error;
		}

		const options: ProbeOptions = {
			...this.settings.probe,
			...overrides.port !== undefined ? { port: overrides.port } : {},
			...overrides.attempts !== undefined ? { attempts: overrides.attempts } : {},
		};

		const controller = new AbortController();
		const deadline = setTimeout(() => {
			logger.warn(`Probe of ${target.value} exceeded the ${this.settings.requestTimeout} ms deadline. Returning a partial result.`);
			controller.abort();
		}, this.settings.requestTimeout);

		try {
			return await runProbe(target, options, {
				signal: controller.signal,
				...this.settings.lookup ? { lookup: this.settings.lookup } : {},
				...this.settings.connect ? { connect: this.settings.connect } : {},
			});
		} finally {
			clearTimeout(deadline);
		}
	}
}
