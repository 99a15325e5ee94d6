import Joi from 'joi';
import type { ProbeResult, ProbeStatus } from '../types.js';
import { getConfValue } from './config.js';

export type LookupRequest = {
	target: string;
	port?: number;
	attempts?: number;
};

export type LookupResponse = {
	target: string;
	status: ProbeStatus;
	success_count: number;
	attempts: number;
	latency_ms: {
		min: number;
		avg: number;
		max: number;
	} | null;
	resolved_address: string | null;
	port: number | null;
	error?: string;
};

export type HealthResponse = {
	status: 'ok';
	version: string;
};

export type ErrorResponse = {
	status: 'error';
	message: string;
};

export const lookupRequestSchema = Joi.object<LookupRequest>({
	target: Joi.string().allow('').required(),
	port: Joi.number().integer().min(1).max(65535),
	attempts: Joi.number().integer().min(1).max(getConfValue<number>('probe.maxAttempts')),
}).unknown(true).required();

export const lookupResponseSchema = Joi.object<LookupResponse>({
	target: Joi.string().allow('').required(),
	status: Joi.string().valid('reachable', 'unreachable', 'invalid_target').required(),
	success_count: Joi.number().integer().min(0).max(Joi.ref('attempts')).required(),
	attempts: Joi.number().integer().min(0).required(),
	latency_ms: Joi.object({
		min: Joi.number().min(0).required(),
		avg: Joi.number().min(0).required(),
		max: Joi.number().min(0).required(),
	}).allow(null).required(),
	resolved_address: Joi.string().allow(null),
	port: Joi.number().integer().allow(null),
	error: Joi.string().allow(''),
}).unknown(true);

export const toWireResult = (result: ProbeResult): LookupResponse => ({
	target: result.target,
	status: result.status,
	success_count: result.successCount,
	attempts: result.attempts.length,
	latency_ms: result.latency ? { min: result.latency.min, avg: result.latency.avg, max: result.latency.max } : null,
	resolved_address: result.resolvedAddress,
	port: result.port,
	...result.error !== undefined ? { error: result.error } : {},
});
