export class ServiceUnreachableError extends Error {
	constructor (readonly url: string, reason: string) {
		super(reason);
		this.name = 'ServiceUnreachableError';
	}
}
