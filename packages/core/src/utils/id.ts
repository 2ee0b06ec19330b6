import { randomInt, randomUUID } from "node:crypto";
import type { EntityKind, IdentityService } from "../types/collaborators.js";

export function generateId(): string {
	return randomUUID();
}

/** "AC" followed by 8 random digits. */
export function generateAccountNumber(): string {
	return `AC${String(randomInt(0, 100_000_000)).padStart(8, "0")}`;
}

/**
 * UUID ids and random account numbers. Account numbers are only probably
 * unique; deployments with many accounts should supply a service backed by a
 * sequence.
 */
export function createRandomIdentity(): IdentityService {
	return {
		nextId: () => generateId(),
		nextAccountNumber: () => generateAccountNumber(),
	};
}

/**
 * In-process counters producing zero-padded ids ("account-000001") that sort
 * in allocation order. Unique within one process only.
 */
export function createSequentialIdentity(options?: { width?: number }): IdentityService {
	const width = options?.width ?? 6;
	const counters = new Map<string, number>();

	const next = (key: string): string => {
		const value = (counters.get(key) ?? 0) + 1;
		counters.set(key, value);
		return String(value).padStart(width, "0");
	};

	return {
		nextId: (kind: EntityKind) => `${kind}-${next(kind)}`,
		nextAccountNumber: () => `AC${next("accountNumber").padStart(8, "0")}`,
	};
}
