import net from 'node:net';
import * as sinon from 'sinon';
import type { ProbeAttempt, ProbeOutcome } from '../src/types.js';
import type { ConnectFunction } from '../src/probe/tcp-probe.js';

export const makeAttempt = (outcome: ProbeOutcome, elapsed: number, timestamp = 1_700_000_000_000): ProbeAttempt => ({ outcome, elapsed, timestamp });

/**
 * Connect stub that resolves the given attempts in order, one per call.
 */
export const sequenceConnect = (attempts: ProbeAttempt[]) => {
	const stub = sinon.stub<Parameters<ConnectFunction>, ReturnType<ConnectFunction>>();

	attempts.forEach((attempt, index) => {
		stub.onCall(index).resolves(attempt);
	});

	return stub;
};

/**
 * Connect fake that never completes on its own and reports a timeout once the signal aborts.
 */
export const hangingConnect: ConnectFunction = (_address, _port, _family, _timeout, signal) => new Promise((resolve) => {
	signal?.addEventListener('abort', () => resolve(makeAttempt('timeout', 0)), { once: true });
});

/**
 * TCP servers on loopback for connect tests.
 */
export class TcpServerFactory {
	private servers: net.Server[] = [];

	async createServer (): Promise<number> {
		const server = net.createServer((socket) => {
			socket.destroy();
		});

		return this.startServer(server);
	}

	/**
	 * Returns a port that refuses connections.
	 */
	async createRefusedPort (): Promise<number> {
		const server = net.createServer();
		const port = await this.startServer(server);

		await this.stopServer(server);
		this.servers = this.servers.filter(s => s !== server);

		return port;
	}

	async stopAllServers (): Promise<void> {
		await Promise.all(this.servers.map(server => this.stopServer(server)));
		this.servers = [];
	}

	private startServer (server: net.Server): Promise<number> {
		return new Promise((resolve, reject) => {
			server.on('error', reject);

			server.listen(0, '127.0.0.1', () => {
				const address = server.address();

				if (address === null || typeof address === 'string') {
					reject(new Error('Server has no TCP address.'));
					return;
				}

				this.servers.push(server);
				resolve(address.port);
			});
		});
	}

	private stopServer (server: net.Server): Promise<void> {
		return new Promise((resolve) => {
			server.close(() => {
				resolve();
			});
		});
	}
}
