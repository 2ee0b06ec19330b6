import type { FiscusAdapter } from "../db/adapter.js";
import type { CatalogLookup, Clock, IdentityService } from "./collaborators.js";
import type { FiscusLogger } from "./config.js";
import type { FiscusPlugin } from "./plugin.js";

export interface FiscusContext {
	adapter: FiscusAdapter;
	options: ResolvedFiscusOptions;
	logger: FiscusLogger;
	plugins: FiscusPlugin[];
	catalog: CatalogLookup;
	identity: IdentityService;
	clock: Clock;
	/** Pre-computed hook cache. Built at context creation. */
	_hookCache?: {
		beforeOperation: FiscusPlugin[];
		afterOperation: FiscusPlugin[];
	};
}

export interface ResolvedFiscusOptions {
	currency: string;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedAdvancedOptions {
	lockTimeoutMs: number;
	maxTransactionAmount: number;
	hmacSecret: string | null;
}
