// =============================================================================
// WORKER RUNNER -- Background worker infrastructure for fiscus
// =============================================================================
// Runs plugin-contributed workers on a polling loop. A worker never overlaps
// itself: the next run is scheduled only after the current one settles.

import type { FiscusContext, FiscusWorkerDefinition } from "@fiscus/core";

// =============================================================================
// INTERVAL PARSING
// =============================================================================

const INTERVAL_UNITS = {
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
} as const;

function isIntervalUnit(unit: string): unit is keyof typeof INTERVAL_UNITS {
	return unit in INTERVAL_UNITS;
}

/**
 * Parse a human-friendly interval string into milliseconds.
 *
 * Supported formats: "5s", "1m", "30m", "1h", "1d"
 */
export function parseInterval(interval: string): number {
	const match = interval.match(/^(\d+(?:\.\d+)?)\s*(s|m|h|d)$/);
	const unit = match?.[2];
	if (!match || unit === undefined || !isIntervalUnit(unit)) {
		throw new Error(
			`Invalid interval "${interval}". Expected format: <number><s|m|h|d> (e.g. "5s", "1m", "1h", "1d")`,
		);
	}

	const value = Number(match[1]);
	if (value <= 0) {
		throw new Error(`Interval value must be positive, got ${value}`);
	}

	return value * INTERVAL_UNITS[unit];
}

// =============================================================================
// JITTER
// =============================================================================

/** Apply ±25% jitter to an interval to prevent thundering herd. */
export function withJitter(ms: number, random: () => number = Math.random): number {
	const jitterFactor = 0.75 + random() * 0.5; // [0.75, 1.25]
	return Math.round(ms * jitterFactor);
}

// =============================================================================
// WORKER RUNNER CLASS
// =============================================================================

interface RunningWorker {
	definition: FiscusWorkerDefinition;
	intervalMs: number;
	timer: ReturnType<typeof setTimeout> | null;
	running: Promise<void> | null;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export class FiscusWorkerRunner {
	private readonly ctx: FiscusContext;
	private readonly workers: RunningWorker[] = [];
	private started = false;
	private stopped = false;

	constructor(ctx: FiscusContext) {
		this.ctx = ctx;
	}

	// ---------------------------------------------------------------------------
	// START
	// ---------------------------------------------------------------------------

	start(): void {
		if (this.started) {
			throw new Error("FiscusWorkerRunner is already started");
		}
		this.started = true;

		const definitions: FiscusWorkerDefinition[] = [];
		for (const plugin of this.ctx.plugins) {
			for (const worker of plugin.workers ?? []) {
				definitions.push(worker);
			}
		}

		if (definitions.length === 0) {
			this.ctx.logger.info("No plugin workers registered");
			return;
		}

		// Parse every interval before scheduling anything
		const parsed = definitions.map((definition) => ({
			definition,
			intervalMs: parseInterval(definition.interval),
		}));

		this.ctx.logger.info("Starting worker runner", {
			workerCount: definitions.length,
			workers: definitions.map((w) => w.id),
		});

		for (const { definition, intervalMs } of parsed) {
			const runningWorker: RunningWorker = {
				definition,
				intervalMs,
				timer: null,
				running: null,
			};
			this.workers.push(runningWorker);
			this.scheduleNext(runningWorker);
		}
	}

	// ---------------------------------------------------------------------------
	// STOP
	// ---------------------------------------------------------------------------

	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;

		this.ctx.logger.info("Stopping worker runner", { workerCount: this.workers.length });

		for (const worker of this.workers) {
			if (worker.timer !== null) {
				clearTimeout(worker.timer);
				worker.timer = null;
			}
		}

		const inFlight = this.workers.filter((w) => w.running !== null);
		if (inFlight.length === 0) return;

		this.ctx.logger.info("Waiting for running workers to finish", {
			count: inFlight.length,
			workers: inFlight.map((w) => w.definition.id),
		});

		let shutdownTimer: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<"timeout">((resolve) => {
			shutdownTimer = setTimeout(() => resolve("timeout"), SHUTDOWN_TIMEOUT_MS);
		});
		const outcome = await Promise.race([
			Promise.all(inFlight.map((w) => w.running)).then(() => "done" as const),
			timedOut,
		]);
		clearTimeout(shutdownTimer);

		if (outcome === "timeout") {
			this.ctx.logger.warn("Worker shutdown timed out, proceeding", {
				stillRunning: this.workers.filter((w) => w.running !== null).map((w) => w.definition.id),
			});
		}
	}

	// ---------------------------------------------------------------------------
	// SCHEDULING
	// ---------------------------------------------------------------------------

	private scheduleNext(worker: RunningWorker): void {
		if (this.stopped) return;

		const delay = withJitter(worker.intervalMs);
		worker.timer = setTimeout(() => {
			worker.timer = null;
			worker.running = this.executeWorker(worker).finally(() => {
				worker.running = null;
				this.scheduleNext(worker);
			});
		}, delay);
	}

	// ---------------------------------------------------------------------------
	// EXECUTION
	// ---------------------------------------------------------------------------

	/** Never rejects: handler failures are logged. */
	private async executeWorker(worker: RunningWorker): Promise<void> {
		const { definition } = worker;
		try {
			await definition.handler(this.ctx);
		} catch (error) {
			this.ctx.logger.error("Worker execution failed", {
				workerId: definition.id,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}

// =============================================================================
// FACTORY
// =============================================================================

export function createWorkerRunner(ctx: FiscusContext): FiscusWorkerRunner {
	return new FiscusWorkerRunner(ctx);
}
