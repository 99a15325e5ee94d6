import { expect } from 'chai';
import * as sinon from 'sinon';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../../src/server/app.js';
import type { LookupSettings } from '../../../src/server/lookup-service.js';
import type { ConnectFunction } from '../../../src/probe/tcp-probe.js';
import { VERSION } from '../../../src/constants.js';
import { scopedLogger } from '../../../src/lib/logger.js';
import { hangingConnect, makeAttempt } from '../../utils.js';

describe('server', () => {
	let app: FastifyInstance;
	const connect = sinon.stub<Parameters<ConnectFunction>, ReturnType<ConnectFunction>>();

	const settings: LookupSettings = {
		probe: { port: 443, attempts: 3, timeout: 200, interval: 0 },
		requestTimeout: 1000,
		connect,
		lookup: async () => ({ address: '192.0.2.7', family: 4 }),
	};

	before(async () => {
		app = await buildServer(settings);
	});

	afterEach(() => {
		connect.reset();
	});

	after(async () => {
		await app.close();
	});

	describe('GET /health', () => {
		it('should report liveness', async () => {
			const response = await app.inject({ method: 'GET', url: '/health' });

			expect(response.statusCode).to.equal(200);
			expect(response.json()).to.deep.equal({ status: 'ok', version: VERSION });
		});

		it('should log every health check at info level', async () => {
			const info = sinon.stub(scopedLogger('health'), 'info');

			try {
				await app.inject({ method: 'GET', url: '/health', remoteAddress: '203.0.113.9' });
			} finally {
				info.restore();
			}

			expect(info.callCount).to.equal(1);
			expect(info.firstCall.args[0]).to.equal('Health check from 203.0.113.9 answered ok.');
		});

		it('should not touch the probe engine', async () => {
			await app.inject({ method: 'GET', url: '/health' });
			expect(connect.called).to.be.false;
		});
	});

	describe('POST /lookup', () => {
		it('should return the aggregated result for a reachable target', async () => {
			connect.onCall(0).resolves(makeAttempt('success', 10));
			connect.onCall(1).resolves(makeAttempt('success', 12));
			connect.onCall(2).resolves(makeAttempt('success', 11));

			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '8.8.8.8' } });

			expect(response.statusCode).to.equal(200);
			expect(response.json()).to.deep.equal({
				target: '8.8.8.8',
				status: 'reachable',
				success_count: 3,
				attempts: 3,
				latency_ms: { min: 10, avg: 11, max: 12 },
				resolved_address: '8.8.8.8',
				port: 443,
			});
		});

		it('should return unreachable with null latency when every attempt times out', async () => {
			connect.resolves(makeAttempt('timeout', 200));

			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '10.255.255.1' } });

			expect(response.statusCode).to.equal(200);
			expect(response.json()).to.deep.equal({
				target: '10.255.255.1',
				status: 'unreachable',
				success_count: 0,
				attempts: 3,
				latency_ms: null,
				resolved_address: '10.255.255.1',
				port: 443,
			});
		});

		it('should resolve hostnames before probing', async () => {
			connect.resolves(makeAttempt('refused', 1));

			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: 'Service.Example' } });

			expect(response.json()).to.include({ target: 'service.example', status: 'unreachable', resolved_address: '192.0.2.7' });
			expect(connect.firstCall.args.slice(0, 3)).to.deep.equal([ '192.0.2.7', 443, 4 ]);
		});

		it('should answer 200 invalid_target for a malformed target without probing', async () => {
			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '!!!bad_host!!!' } });

			expect(response.statusCode).to.equal(200);
			expect(response.json()).to.deep.equal({
				target: '!!!bad_host!!!',
				status: 'invalid_target',
				success_count: 0,
				attempts: 0,
				latency_ms: null,
				resolved_address: null,
				port: null,
				error: 'not a valid IP address or hostname',
			});

			expect(connect.called).to.be.false;
		});

		it('should treat an empty target as invalid_target', async () => {
			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '' } });

			expect(response.statusCode).to.equal(200);
			expect(response.json()).to.include({ status: 'invalid_target', error: 'target is required' });
		});

		it('should pass port and attempt overrides to the probe', async () => {
			connect.resolves(makeAttempt('success', 2));

			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '1.1.1.1', port: 53, attempts: 2 } });

			expect(response.json()).to.include({ success_count: 2, attempts: 2, port: 53 });
			expect(connect.callCount).to.equal(2);
		});

		it('should reject a body without a target', async () => {
			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { host: '8.8.8.8' } });

			expect(response.statusCode).to.equal(400);
			expect(response.json()).to.deep.equal({ status: 'error', message: 'invalid request: "target" is required' });
		});

		it('should reject too many attempts', async () => {
			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '8.8.8.8', attempts: 11 } });

			expect(response.statusCode).to.equal(400);
			expect(response.json()).to.deep.equal({ status: 'error', message: 'invalid request: "attempts" must be less than or equal to 10' });
		});

		it('should reject a body that is not JSON', async () => {
			const response = await app.inject({
				method: 'POST',
				url: '/lookup',
				headers: { 'content-type': 'application/json' },
				payload: '{"target":',
			});

			expect(response.statusCode).to.equal(400);
			expect(response.json()).to.include({ status: 'error' });
		});

		it('should answer 500 on a server-side fault', async () => {
			connect.rejects(new Error('socket table exhausted'));

			const response = await app.inject({ method: 'POST', url: '/lookup', payload: { target: '8.8.8.8' } });

			expect(response.statusCode).to.equal(500);
			expect(response.json()).to.deep.equal({ status: 'error', message: 'Internal server error.' });
		});
	});

	describe('request deadline', () => {
		let slowApp: FastifyInstance;

		before(async () => {
			slowApp = await buildServer({ ...settings, requestTimeout: 30, connect: hangingConnect });
		});

		after(async () => {
			await slowApp.close();
		});

		it('should return a partial result instead of hanging', async () => {
			const response = await slowApp.inject({ method: 'POST', url: '/lookup', payload: { target: '192.0.2.1' } });

			expect(response.statusCode).to.equal(200);
			expect(response.json()).to.include({ status: 'unreachable', success_count: 0, attempts: 1, latency_ms: null });
		});
	});

	it('should answer 404 for unknown routes', async () => {
		const response = await app.inject({ method: 'GET', url: '/missing' });

		expect(response.statusCode).to.equal(404);
		expect(response.json()).to.deep.equal({ status: 'error', message: 'Route GET /missing not found.' });
	});
});
