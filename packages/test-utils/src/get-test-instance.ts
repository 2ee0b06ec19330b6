import { createSequentialIdentity, type FiscusPlugin } from "@fiscus/core";
import { createSilentLogger } from "@fiscus/core/logger";
import { memoryAdapter } from "@fiscus/memory-adapter";
import { createFiscus, createStaticCatalog, type Fiscus, type FiscusOptions } from "fiscus";

export const TEST_ACCOUNT_TYPES = { SAVINGS: "type-savings", CURRENT: "type-current" } as const;
export const TEST_LOAN_PRODUCTS = { PLN: "product-pln" } as const;

/** 2026-10-01T00:00:00.000Z */
export const TEST_EPOCH = Date.UTC(2026, 9, 1);

export interface TestInstanceOptions {
	/** Database adapter. Default: a fresh memoryAdapter */
	adapter?: FiscusOptions["database"];
	/** Plugins to enable */
	plugins?: FiscusPlugin[];
	/** Identity service. Default: sequential ids ("account-000001") */
	identity?: FiscusOptions["identity"];
	/** Advanced options. hmacSecret defaults to "test-secret" */
	advanced?: FiscusOptions["advanced"];
	/** Logger. Default: silent */
	logger?: FiscusOptions["logger"];
}

export interface TestInstance {
	/** The fiscus instance */
	fiscus: Fiscus;
	/** Cleanup function -- call in afterEach/afterAll */
	cleanup: () => Promise<void>;
}

/**
 * Clock that advances one millisecond per reading, so records written one
 * after another never share a timestamp.
 */
export function createSteppingClock(start = TEST_EPOCH): () => Date {
	let tick = 0;
	return () => new Date(start + tick++);
}

export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const fiscus = createFiscus({
		database: options.adapter ?? memoryAdapter({ lockTimeoutMs: 1000 }),
		currency: "USD",
		catalog: createStaticCatalog({
			accountTypes: { ...TEST_ACCOUNT_TYPES },
			loanProducts: { ...TEST_LOAN_PRODUCTS },
		}),
		identity: options.identity ?? createSequentialIdentity(),
		clock: createSteppingClock(),
		plugins: options.plugins ?? [],
		advanced: { hmacSecret: "test-secret", ...options.advanced },
		logger: options.logger ?? createSilentLogger(),
	});

	// Wait for initialization
	await fiscus.$context;

	return {
		fiscus,
		cleanup: async () => {
			await fiscus.workers.stop();
		},
	};
}
