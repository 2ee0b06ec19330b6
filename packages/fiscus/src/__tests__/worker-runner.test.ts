import type { FiscusContext, FiscusPlugin } from "@fiscus/core";
import { memoryAdapter } from "@fiscus/memory-adapter";
import { getTestInstance } from "@fiscus/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildContext } from "../context/context.js";
import { FiscusWorkerRunner, parseInterval, withJitter } from "../infrastructure/worker-runner.js";

// ---------------------------------------------------------------------------
// parseInterval
// ---------------------------------------------------------------------------

describe("parseInterval", () => {
	it.each([
		["5s", 5_000],
		["1m", 60_000],
		["30m", 1_800_000],
		["1h", 3_600_000],
		["0.5h", 1_800_000],
		["1d", 86_400_000],
	])('parses "%s" to %d ms', (input, expected) => {
		expect(parseInterval(input)).toBe(expected);
	});

	it.each(["100", "5x", "", "-5s", "abc"])('throws on "%s"', (input) => {
		expect(() => parseInterval(input)).toThrow(/Invalid interval/);
	});

	it("throws on a zero interval", () => {
		expect(() => parseInterval("0s")).toThrow("Interval value must be positive, got 0");
	});
});

describe("withJitter", () => {
	it("stays within 25% of the interval", () => {
		expect(withJitter(1_000, () => 0)).toBe(750);
		expect(withJitter(1_000, () => 0.5)).toBe(1_000);
		expect(withJitter(1_000, () => 1)).toBe(1_250);
	});
});

// ---------------------------------------------------------------------------
// FiscusWorkerRunner
// ---------------------------------------------------------------------------

describe("FiscusWorkerRunner", () => {
	async function createContext(plugins: FiscusPlugin[] = []): Promise<FiscusContext> {
		return buildContext({
			database: memoryAdapter(),
			plugins,
			advanced: { hmacSecret: "test-secret" },
			logger: {
				info: vi.fn(),
				error: vi.fn(),
				warn: vi.fn(),
				debug: vi.fn(),
			},
		});
	}

	function workerPlugin(id: string, handler: () => Promise<void>, interval = "5s"): FiscusPlugin {
		return { id, workers: [{ id: `${id}-worker`, interval, handler }] };
	}

	beforeEach(() => {
		vi.useFakeTimers();
		// No jitter: every run lands exactly on its interval
		vi.spyOn(Math, "random").mockReturnValue(0.5);
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it("logs the registered workers on start", async () => {
		const ctx = await createContext([
			workerPlugin("a", vi.fn(async () => {})),
			{
				id: "b",
				workers: [
					{ id: "b-1", interval: "10s", handler: vi.fn(async () => {}) },
					{ id: "b-2", interval: "1m", handler: vi.fn(async () => {}) },
				],
			},
			{ id: "no-workers" },
		]);
		const runner = new FiscusWorkerRunner(ctx);
		runner.start();

		expect(ctx.logger.info).toHaveBeenCalledWith("Starting worker runner", {
			workerCount: 3,
			workers: ["a-worker", "b-1", "b-2"],
		});
		await runner.stop();
	});

	it("logs a message when no workers are registered", async () => {
		const ctx = await createContext();
		const runner = new FiscusWorkerRunner(ctx);
		runner.start();

		expect(ctx.logger.info).toHaveBeenCalledWith("No plugin workers registered");
		await runner.stop();
	});

	it("throws if started twice", async () => {
		const runner = new FiscusWorkerRunner(await createContext());
		runner.start();

		expect(() => runner.start()).toThrow("FiscusWorkerRunner is already started");
		await runner.stop();
	});

	it("rejects an invalid interval before scheduling anything", async () => {
		const handler = vi.fn(async () => {});
		const ctx = await createContext([workerPlugin("bad", handler, "soon")]);
		const runner = new FiscusWorkerRunner(ctx);

		expect(() => runner.start()).toThrow(/Invalid interval "soon"/);
		await vi.advanceTimersByTimeAsync(60_000);
		expect(handler).not.toHaveBeenCalled();
	});

	it("runs a worker on its interval", async () => {
		const handler = vi.fn(async () => {});
		const runner = new FiscusWorkerRunner(await createContext([workerPlugin("tick", handler)]));
		runner.start();

		await vi.advanceTimersByTimeAsync(4_999);
		expect(handler).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		expect(handler).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(10_000);
		expect(handler).toHaveBeenCalledTimes(3);
		await runner.stop();
	});

	it("never overlaps runs of the same worker", async () => {
		let release: () => void = () => {};
		const handler = vi.fn(
			() =>
				new Promise<void>((resolve) => {
					release = resolve;
				}),
		);
		const runner = new FiscusWorkerRunner(await createContext([workerPlugin("slow", handler)]));
		runner.start();

		await vi.advanceTimersByTimeAsync(5_000);
		expect(handler).toHaveBeenCalledTimes(1);

		// Still running: no new run is scheduled
		await vi.advanceTimersByTimeAsync(60_000);
		expect(handler).toHaveBeenCalledTimes(1);

		release();
		await vi.advanceTimersByTimeAsync(5_000);
		expect(handler).toHaveBeenCalledTimes(2);

		release();
		await runner.stop();
	});

	it("logs a failing run and keeps scheduling", async () => {
		const handler = vi.fn(async () => {
			throw new Error("store offline");
		});
		const ctx = await createContext([workerPlugin("flaky", handler)]);
		const runner = new FiscusWorkerRunner(ctx);
		runner.start();

		await vi.advanceTimersByTimeAsync(5_000);
		expect(ctx.logger.error).toHaveBeenCalledWith("Worker execution failed", {
			workerId: "flaky-worker",
			error: "store offline",
		});

		await vi.advanceTimersByTimeAsync(5_000);
		expect(handler).toHaveBeenCalledTimes(2);
		await runner.stop();
	});

	it("stop waits for the running handler and schedules nothing afterwards", async () => {
		let release: () => void = () => {};
		let finished = false;
		const handler = vi.fn(
			() =>
				new Promise<void>((resolve) => {
					release = () => {
						finished = true;
						resolve();
					};
				}),
		);
		const ctx = await createContext([workerPlugin("slow", handler)]);
		const runner = new FiscusWorkerRunner(ctx);
		runner.start();
		await vi.advanceTimersByTimeAsync(5_000);

		const stopping = runner.stop();
		expect(ctx.logger.info).toHaveBeenCalledWith("Stopping worker runner", { workerCount: 1 });
		release();
		await stopping;
		expect(finished).toBe(true);

		await vi.advanceTimersByTimeAsync(60_000);
		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("stop is idempotent", async () => {
		const ctx = await createContext([workerPlugin("tick", vi.fn(async () => {}))]);
		const runner = new FiscusWorkerRunner(ctx);
		runner.start();

		await runner.stop();
		await runner.stop();

		const stops = vi
			.mocked(ctx.logger.info)
			.mock.calls.filter(([message]) => message === "Stopping worker runner");
		expect(stops).toHaveLength(1);
	});
});

// ---------------------------------------------------------------------------
// fiscus.workers
// ---------------------------------------------------------------------------

describe("fiscus.workers", () => {
	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it("starts plugin workers and stops them", async () => {
		vi.useFakeTimers();
		vi.spyOn(Math, "random").mockReturnValue(0.5);

		const handler = vi.fn(async () => {});
		const { fiscus } = await getTestInstance({
			plugins: [{ id: "tick", workers: [{ id: "tick", interval: "1m", handler }] }],
		});

		await fiscus.workers.start();
		// A second start is a no-op
		await fiscus.workers.start();

		await vi.advanceTimersByTimeAsync(60_000);
		expect(handler).toHaveBeenCalledTimes(1);

		await fiscus.workers.stop();
		await vi.advanceTimersByTimeAsync(120_000);
		expect(handler).toHaveBeenCalledTimes(1);
	});
});
