import type { FiscusAdapter } from "../db/adapter.js";
import type { CatalogLookup, Clock, IdentityService } from "./collaborators.js";
import type { FiscusPlugin } from "./plugin.js";

export interface FiscusOptions {
	/** Database adapter instance or factory function */
	database: FiscusAdapter | (() => FiscusAdapter);

	/** Currency code of every amount (default: "USD"). Only used for precision. */
	currency?: string;

	/** Account-type and loan-product lookup. Default: read from the adapter's catalog tables. */
	catalog?: CatalogLookup;

	/** Identifier allocation. Default: UUIDs and random "AC" account numbers. */
	identity?: IdentityService;

	/** Timestamp source for every record. Default: `() => new Date()` */
	clock?: Clock;

	/** Plugins to enable */
	plugins?: FiscusPlugin[];

	/** Advanced configuration */
	advanced?: FiscusAdvancedOptions;

	/** Custom logger */
	logger?: FiscusLogger;
}

export interface FiscusAdvancedOptions {
	/** How long a transaction waits for a row lock before failing with CONTENTION. Default: 3000 */
	lockTimeoutMs?: number;
	/** Maximum single transaction amount in minor units. Default: 1_000_000_000_000 */
	maxTransactionAmount?: number;
	/** HMAC secret for audit entry hashes. Strongly recommended for production. */
	hmacSecret?: string;
}

export interface FiscusLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
