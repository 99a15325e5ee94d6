export class InvalidTargetError extends Error {
	constructor (readonly target: string, reason: string) {
		super(reason);
		this.name = 'InvalidTargetError';
	}
}
