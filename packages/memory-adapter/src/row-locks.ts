// =============================================================================
// ROW LOCKS -- exclusive, re-entrant holds keyed by string
// =============================================================================
// A hold belongs to one transaction until that transaction ends. Waiters are
// served first come, first served; a waiter that is not served within its
// timeout fails with CONTENTION.

import { FiscusError } from "@fiscus/core";

export type LockOwner = number;

interface Waiter {
	owner: LockOwner;
	resolve: () => void;
	timer: ReturnType<typeof setTimeout>;
}

interface LockState {
	owner: LockOwner;
	waiters: Waiter[];
}

export class RowLockManager {
	private readonly locks = new Map<string, LockState>();
	private readonly held = new Map<LockOwner, Set<string>>();

	/** Resolves once `owner` holds `key`. Re-acquiring a held key resolves immediately. */
	acquire(key: string, owner: LockOwner, timeoutMs: number): Promise<void> {
		const state = this.locks.get(key);
		if (!state) {
			this.locks.set(key, { owner, waiters: [] });
			this.track(owner, key);
			return Promise.resolve();
		}
		if (state.owner === owner) {
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = {
				owner,
				resolve,
				timer: setTimeout(() => {
					const index = state.waiters.indexOf(waiter);
					if (index === -1) return;
					state.waiters.splice(index, 1);
					reject(
						FiscusError.contention(`Timed out after ${timeoutMs}ms waiting for lock on ${key}`, {
							details: { key, timeoutMs },
						}),
					);
				}, timeoutMs),
			};
			state.waiters.push(waiter);
		});
	}

	/** Release every hold of `owner`, handing each key to its next waiter. */
	releaseAll(owner: LockOwner): void {
		const keys = this.held.get(owner);
		if (!keys) return;
		this.held.delete(owner);
		for (const key of keys) {
			this.handOff(key);
		}
	}

	holderOf(key: string): LockOwner | undefined {
		return this.locks.get(key)?.owner;
	}

	waitingOn(key: string): number {
		return this.locks.get(key)?.waiters.length ?? 0;
	}

	private handOff(key: string): void {
		const state = this.locks.get(key);
		if (!state) return;

		const next = state.waiters.shift();
		if (!next) {
			this.locks.delete(key);
			return;
		}
		clearTimeout(next.timer);
		state.owner = next.owner;
		this.track(next.owner, key);
		next.resolve();
	}

	private track(owner: LockOwner, key: string): void {
		let keys = this.held.get(owner);
		if (!keys) {
			keys = new Set();
			this.held.set(owner, keys);
		}
		keys.add(key);
	}
}
