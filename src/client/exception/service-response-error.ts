export class ServiceResponseError extends Error {
	constructor (readonly url: string, reason: string) {
		super(reason);
		this.name = 'ServiceResponseError';
	}
}
