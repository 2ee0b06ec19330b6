/** Deterministic 32-bit hash for advisory lock keys */
export function hashLockKey(input: string): number {
	let hash = 0;
	for (let i = 0; i < input.length; i++) {
		const char = input.charCodeAt(i);
		hash = ((hash << 5) - hash + char) | 0;
	}
	return hash;
}

/**
 * Distinct ids in the order their holds must be taken: ascending by code unit.
 * Every multi-row operation locks through this order, so no two transactions
 * can wait on each other in a cycle.
 */
export function lockOrder(ids: readonly string[]): string[] {
	return [...new Set(ids)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
