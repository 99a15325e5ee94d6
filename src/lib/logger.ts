import process from 'node:process';
import { inspect } from 'node:util';
import * as winston from 'winston';
import { getConfValue } from './config.js';

const levels = Object.keys(winston.config.npm.levels);

const objectFormatter = (object: object) => {
	const entries = Object.entries(object).map(([ key, value ]) => {
		if (value instanceof Error) {
			return [ key, value.message ];
		}

		return [ key, value ];
	});

	return inspect(Object.fromEntries(entries), { breakLength: Infinity });
};

export const getWinstonMessageContent = (info: Partial<winston.Logform.TransformableInfo>) => {
	const { timestamp, level, scope, message, stack, ...otherFields } = info;
	let result = typeof message === 'object' && message !== null ? objectFormatter(message) : String(message);

	if (Object.keys(otherFields).length > 0) {
		result += ` ${objectFormatter(otherFields)}`;
	}

	if (typeof stack === 'string') {
		result += `\n${stack}`;
	}

	return result;
};

const lineFormat = winston.format.combine(
	winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss Z' }),
	winston.format.printf((info: winston.Logform.TransformableInfo) => {
		const { timestamp, level, scope } = info;
		const message = getWinstonMessageContent(info);

		return `[${String(timestamp)}] [${level.toUpperCase()}] [${String(scope)}] ${message}`;
	}),
);

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
	// stdout belongs to the CLI output
	new winston.transports.Console({ stderrLevels: levels }),
];

if (process.env['IPTEST_LOG_FILE']) {
	transports.push(new winston.transports.File({ filename: process.env['IPTEST_LOG_FILE'] }));
}

const logger = winston.createLogger({
	level: getLogLevel(),
	format: lineFormat,
	transports,
});

const scopedLoggers = new Map<string, winston.Logger>();

export const scopedLogger = (scope: string): winston.Logger => {
	let scoped = scopedLoggers.get(scope);

	if (!scoped) {
		scoped = logger.child({ scope });
		scopedLoggers.set(scope, scoped);
	}

	return scoped;
};

function getLogLevel () {
	const logLevel = process.env['IPTEST_LOG_LEVEL']?.toLowerCase();

	if (logLevel && levels.includes(logLevel)) {
		return logLevel;
	}

	return getConfValue<string>('log.level');
}
