import os from 'node:os';
import path from 'node:path';

/*
 * Keeps `precision` decimals below 10 and one fewer for each further order of magnitude.
 */
export const roundNumber = (value: number, precision = 3): number => {
	for (let i = 0; i <= precision; i++) {
		if (value < Math.pow(10, i + 1)) {
			return Math.round(value * Math.pow(10, precision - i)) / Math.pow(10, precision - i);
		}
	}

	return Math.round(value);
};

export const parsePositiveInt = (value: string | undefined): number | undefined => {
	if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
		return undefined;
	}

	const parsed = Number.parseInt(value, 10);
	return parsed > 0 ? parsed : undefined;
};

export const expandHome = (filePath: string): string => {
	if (filePath === '~' || filePath.startsWith('~/')) {
		return path.join(os.homedir(), filePath.slice(1));
	}

	return filePath;
};

export const errorMessage = (error: unknown): string => error instanceof Error ? error.message : String(error);
