import dns from 'node:dns';
import isIpPrivate from 'private-ip';
import { getConfValue } from '../lib/config.js';
import { scopedLogger } from '../lib/logger.js';

const logger = scopedLogger('dns-resolver');

export type ResolvedAddress = {
	address: string;
	family: 4 | 6;
};

export type LookupFunction = (hostname: string) => Promise<ResolvedAddress>;
export type AddressListFunction = (hostname: string) => Promise<ResolvedAddress[]>;
export type ResolverFactory = (server: string, timeout: number) => AddressListFunction;

export type LookupOptions = {
	dnsServers: readonly string[];
	dnsServerTimeout: number;
	system?: AddressListFunction;
	resolverFor?: ResolverFactory;
};

export const isPublicAddress = (address: string): boolean => isIpPrivate(address) === false;

export const systemResolver: AddressListFunction = async (hostname) => {
	const records = await dns.promises.lookup(hostname, { all: true });
	return records.map(({ address, family }): ResolvedAddress => ({ address, family: family === 6 ? 6 : 4 }));
};

/**
 * Queries one DNS server directly for A and AAAA records.
 */
export const buildResolver: ResolverFactory = (server, timeout) => {
	const resolver = new dns.promises.Resolver({ timeout, tries: 1 });
	resolver.setServers([ server ]);

	return async (hostname) => {
		const [ ipv4, ipv6 ] = await Promise.allSettled([ resolver.resolve4(hostname), resolver.resolve6(hostname) ]);
		const addresses: ResolvedAddress[] = [];

		if (ipv4.status === 'fulfilled') {
			addresses.push(...ipv4.value.map(address => ({ address, family: 4 as const })));
		}

		if (ipv6.status === 'fulfilled') {
			addresses.push(...ipv6.value.map(address => ({ address, family: 6 as const })));
		}

		if (addresses.length === 0 && ipv4.status === 'rejected') {
			throw ipv4.reason;
		}

		return addresses;
	};
};

/**
 * Builds a lookup that collects every address the system resolver returns.
 * When none of them is public, the fallback DNS servers are asked in turn
 * until one answers with a public address. A public address wins over the
 * first answer.
 */
export const createLookup = ({ dnsServers, dnsServerTimeout, system = systemResolver, resolverFor = buildResolver }: LookupOptions): LookupFunction => async (hostname) => {
	const addresses: ResolvedAddress[] = [];
	let firstError: unknown;

	const collect = async (source: string, resolve: AddressListFunction) => {
		try {
			for (const entry of await resolve(hostname)) {
				if (!addresses.some(known => known.address === entry.address)) {
					addresses.push(entry);
				}
			}
		} catch (error: unknown) {
			if (firstError === undefined) {
				firstError = error;
			}

			logger.debug(`Resolving ${hostname} via ${source} failed.`, error);
		}
	};

	await collect('the system resolver', system);

	for (const server of dnsServers) {
		if (addresses.some(entry => isPublicAddress(entry.address))) {
			break;
		}

		await collect(server, resolverFor(server, dnsServerTimeout));
	}

	const chosen = addresses.find(entry => isPublicAddress(entry.address)) ?? addresses[0];

	if (!chosen) {
		throw firstError ?? new Error(`no addresses found for ${hostname}`);
	}

	return chosen;
};

export const lookupAddress: LookupFunction = hostname => createLookup({
	dnsServers: getConfValue<string[]>('probe.dnsServers'),
	dnsServerTimeout: getConfValue<number>('probe.dnsServerTimeout'),
})(hostname);
