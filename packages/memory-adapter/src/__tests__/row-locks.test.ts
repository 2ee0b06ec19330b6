import { describe, expect, it } from "vitest";
import { RowLockManager } from "../row-locks.js";

describe("RowLockManager", () => {
	it("grants a free key immediately", async () => {
		const locks = new RowLockManager();
		await locks.acquire("account:a1", 1, 100);
		expect(locks.holderOf("account:a1")).toBe(1);
	});

	it("hands keys to waiters in arrival order", async () => {
		const locks = new RowLockManager();
		const granted: number[] = [];
		await locks.acquire("k", 1, 100);

		const second = locks.acquire("k", 2, 100).then(() => granted.push(2));
		const third = locks.acquire("k", 3, 100).then(() => granted.push(3));
		expect(locks.waitingOn("k")).toBe(2);

		locks.releaseAll(1);
		await second;
		expect(locks.holderOf("k")).toBe(2);

		locks.releaseAll(2);
		await third;
		expect(granted).toEqual([2, 3]);

		locks.releaseAll(3);
		expect(locks.holderOf("k")).toBeUndefined();
	});

	it("rejects a waiter after its timeout and forgets it", async () => {
		const locks = new RowLockManager();
		await locks.acquire("k", 1, 100);

		await expect(locks.acquire("k", 2, 10)).rejects.toThrow("Timed out after 10ms waiting for lock on k");
		expect(locks.waitingOn("k")).toBe(0);

		locks.releaseAll(1);
		expect(locks.holderOf("k")).toBeUndefined();
	});

	it("releases every key of an owner", async () => {
		const locks = new RowLockManager();
		await locks.acquire("a", 1, 100);
		await locks.acquire("b", 1, 100);
		locks.releaseAll(1);
		expect(locks.holderOf("a")).toBeUndefined();
		expect(locks.holderOf("b")).toBeUndefined();
	});

	it("ignores release for an owner without holds", () => {
		const locks = new RowLockManager();
		expect(() => locks.releaseAll(99)).not.toThrow();
	});
});
