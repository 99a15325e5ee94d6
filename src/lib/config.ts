import process from 'node:process';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';

const configDir = fileURLToPath(new URL('../../config/', import.meta.url));

const readFile = (name: string): object => {
	const filePath = `${configDir}${name}.json`;

	if (!fs.existsSync(filePath)) {
		return {};
	}

	const parsed: unknown = JSON.parse(fs.readFileSync(filePath).toString());

	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new Error(`Configuration file ${filePath} must contain a JSON object.`);
	}

	return parsed;
};

const defaultConfig = readFile('default');
const envConfig = readFile(process.env['NODE_ENV'] ?? 'production');

const combined = _.merge(defaultConfig, envConfig);

export const getConfValue = <T>(path: string): T => {
	const value: unknown = _.get(combined, path);

	if (value === undefined) {
		throw new Error(`Configuration property "${path}" is not defined.`);
	}

	return value as T;
};
