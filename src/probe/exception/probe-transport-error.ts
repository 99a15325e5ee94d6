import type { ProbeOutcome } from '../../types.js';

export class ProbeTransportError extends Error {
	constructor (readonly outcome: Exclude<ProbeOutcome, 'success'>, message: string, readonly code?: string) {
		super(message);
		this.name = 'ProbeTransportError';
	}
}
