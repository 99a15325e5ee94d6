import { isIPv6 } from 'node:net';
import type { LookupResponse } from '../lib/wire.js';

const formatAddress = (address: string, port: number | null) => {
	const host = isIPv6(address) ? `[${address}]` : address;
	return port === null ? host : `${host}:${port}`;
};

const formatCounts = (response: LookupResponse) => {
	const destination = response.resolved_address ? ` to ${formatAddress(response.resolved_address, response.port)}` : '';
	return `${response.success_count}/${response.attempts} TCP connects${destination} succeeded`;
};

export const renderLookup = (response: LookupResponse): string => {
	switch (response.status) {
		case 'reachable': {
			const latency = response.latency_ms
				? `, latency min/avg/max = ${response.latency_ms.min}/${response.latency_ms.avg}/${response.latency_ms.max} ms`
				: '';

			return `${response.target} is reachable: ${formatCounts(response)}${latency}`;
		}

		case 'unreachable': {
			const reason = response.resolved_address ? '' : ' (host could not be resolved)';
			return `${response.target} is unreachable: ${formatCounts(response)}${reason}`;
		}

		case 'invalid_target':
			return `Invalid target "${response.target}": ${response.error ?? 'not a valid IP address or hostname'}`;
	}
};

export const renderServiceUnreachable = (url: string, reason: string): string => `Could not reach test server at ${url}: ${reason}`;

export const renderServiceFault = (url: string, reason: string): string => `Test server at ${url} failed: ${reason}`;
