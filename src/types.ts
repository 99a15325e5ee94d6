export type Target =
	| { kind: 'ip'; value: string; family: 4 | 6 }
	| { kind: 'hostname'; value: string };

export type ProbeOutcome = 'success' | 'timeout' | 'refused' | 'error';

export type ProbeAttempt = {
	readonly outcome: ProbeOutcome;
	/** Milliseconds from connect start to completion or timeout. */
	readonly elapsed: number;
	/** Wall-clock start of the attempt, epoch milliseconds. */
	readonly timestamp: number;
	readonly message?: string;
};

export type ProbeStatus = 'reachable' | 'unreachable' | 'invalid_target';

export type LatencyStats = {
	readonly min: number;
	readonly avg: number;
	readonly max: number;
};

export type ProbeResult = {
	readonly target: string;
	readonly status: ProbeStatus;
	readonly attempts: readonly ProbeAttempt[];
	readonly successCount: number;
	readonly latency: LatencyStats | null;
	readonly resolvedAddress: string | null;
	readonly port: number | null;
	readonly error?: string;
};

export type ServerEndpoint = {
	readonly url: string;
	/** Overall request timeout in milliseconds. */
	readonly timeout: number;
};

export type ClientConfig = {
	readonly serverUrl: string;
};
