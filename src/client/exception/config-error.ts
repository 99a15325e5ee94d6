export class ConfigError extends Error {
	constructor (readonly source: string, message: string) {
		super(`${source}: ${message}`);
		this.name = 'ConfigError';
	}
}
