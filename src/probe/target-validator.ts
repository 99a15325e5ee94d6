import { isIPv4, isIPv6 } from 'node:net';
import type { Target } from '../types.js';
import { InvalidTargetError } from './exception/invalid-target-error.js';

const MAX_HOSTNAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;
const labelPattern = /^[a-z\d](?:[a-z\d-]*[a-z\d])?$/i;

/**
 * Reduces loose input such as `https://user@example.com:8080/path` or `[::1]:443`
 * to the bare host part.
 */
export const extractHost = (input: string): string => {
	let host = input;
	const schemeIndex = host.indexOf('://');

	if (schemeIndex !== -1) {
		host = host.slice(schemeIndex + 3);
	}

	host = host.split(/[/?#]/, 1)[0] ?? '';
	// user info
	host = host.slice(host.lastIndexOf('@') + 1);

	const bracketed = /^\[([^\]]*)\](?::\d*)?$/.exec(host);

	if (bracketed) {
		return bracketed[1] ?? '';
	}

	if (host.split(':').length === 2) {
		host = host.slice(0, host.indexOf(':'));
	}

	return host;
};

export const isValidHostname = (hostname: string): boolean => {
	if (hostname.length === 0 || hostname.length > MAX_HOSTNAME_LENGTH) {
		return false;
	}

	const labels = hostname.split('.');
	const lastLabel = labels[labels.length - 1] ?? '';

	if (/^\d+$/.test(lastLabel)) {
		return false;
	}

	return labels.every(label => label.length <= MAX_LABEL_LENGTH && labelPattern.test(label));
};

/**
 * Normalizes raw user input into a probe target: an IPv4/IPv6 literal or a
 * syntactically valid hostname. Performs no DNS resolution.
 *
 * @throws {InvalidTargetError}
 */
export const validateTarget = (raw: string): Target => {
	const trimmed = raw.trim();

	if (!trimmed) {
		throw new InvalidTargetError(trimmed, 'target is required');
	}

	const host = extractHost(trimmed);

	if (isIPv4(host)) {
		return { kind: 'ip', value: host, family: 4 };
	}

	if (isIPv6(host)) {
		return { kind: 'ip', value: host, family: 6 };
	}

	const hostname = host.endsWith('.') ? host.slice(0, -1) : host;

	if (hostname.length > MAX_HOSTNAME_LENGTH) {
		throw new InvalidTargetError(trimmed, `hostname is longer than ${MAX_HOSTNAME_LENGTH} characters`);
	}

	if (hostname.split('.').some(label => label.length > MAX_LABEL_LENGTH)) {
		throw new InvalidTargetError(trimmed, `hostname label is longer than ${MAX_LABEL_LENGTH} characters`);
	}

	if (!isValidHostname(hostname)) {
		throw new InvalidTargetError(trimmed, 'not a valid IP address or hostname');
	}

	return { kind: 'hostname', value: hostname.toLowerCase() };
};
