import * as fs from 'node:fs';

const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url)).toString());

export const VERSION = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
