import {
	assertAccountBalance,
	assertLedgerMatchesBalance,
	assertTotalBalance,
	getTestInstance,
	type TestInstance,
} from "@fiscus/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Account, Fiscus } from "../index.js";

/**
 * Overlapping operations against the memory adapter, whose row holds behave
 * like SELECT ... FOR UPDATE.
 */
describe("concurrency", () => {
	let instance: TestInstance;
	let fiscus: Fiscus;

	beforeEach(async () => {
		instance = await getTestInstance();
		fiscus = instance.fiscus;
	});

	afterEach(async () => {
		await instance.cleanup();
	});

	function open(initialDeposit: number): Promise<Account> {
		return fiscus.accounts.open({
			customerId: "cust-1",
			branchId: "branch-1",
			accountTypeCode: "CURRENT",
			initialDeposit,
		});
	}

	it("completes opposing transfers between the same pair without deadlock", async () => {
		const a = await open(10_000);
		const b = await open(10_000);

		const transfers = [];
		for (let i = 0; i < 20; i++) {
			transfers.push(fiscus.transactions.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 100 }));
			transfers.push(fiscus.transactions.transfer({ fromAccountId: b.id, toAccountId: a.id, amount: 100 }));
		}
		const results = await Promise.allSettled(transfers);

		expect(results.filter((r) => r.status === "rejected")).toEqual([]);
		await assertAccountBalance(fiscus, a.id, 10_000);
		await assertAccountBalance(fiscus, b.id, 10_000);
	});

	it("keeps the total of a transfer cycle unchanged", async () => {
		const accounts = [await open(5_000), await open(7_000), await open(9_000)];
		const ids = accounts.map((a) => a.id);

		const transfers = [];
		for (let round = 0; round < 10; round++) {
			for (let i = 0; i < ids.length; i++) {
				const from = ids[i];
				const to = ids[(i + 1) % ids.length];
				if (from === undefined || to === undefined) continue;
				transfers.push(
					fiscus.transactions.transfer({ fromAccountId: from, toAccountId: to, amount: 250 + round }),
				);
			}
		}
		const results = await Promise.allSettled(transfers);

		expect(results.every((r) => r.status === "fulfilled")).toBe(true);
		await assertTotalBalance(fiscus, ids, 21_000);
		for (const id of ids) {
			await assertLedgerMatchesBalance(fiscus, id);
		}
	});

	it("never overdraws under competing withdrawals", async () => {
		const account = await open(1_000);

		const results = await Promise.allSettled(
			Array.from({ length: 5 }, () =>
				fiscus.transactions.withdraw({ accountId: account.id, amount: 300 }),
			),
		);

		const fulfilled = results.filter((r) => r.status === "fulfilled");
		const rejected = results.filter((r) => r.status === "rejected");
		expect(fulfilled).toHaveLength(3);
		expect(rejected).toHaveLength(2);
		for (const r of rejected) {
			expect(r.reason).toMatchObject({ code: "INSUFFICIENT_FUNDS" });
		}
		await assertAccountBalance(fiscus, account.id, 100);
	});

	it("fails with a transient CONTENTION error when a hold outlasts the lock timeout", async () => {
		const local = await getTestInstance({ advanced: { lockTimeoutMs: 50 } });
		const account = await local.fiscus.accounts.open({
			customerId: "cust-1",
			branchId: "branch-1",
			accountTypeCode: "CURRENT",
		});
		const ctx = await local.fiscus.$context;

		await ctx.adapter.transaction(async (tx) => {
			await tx.findOne({
				model: "account",
				where: [{ field: "id", operator: "eq", value: account.id }],
				forUpdate: true,
			});
			await expect(
				local.fiscus.transactions.deposit({ accountId: account.id, amount: 100 }),
			).rejects.toMatchObject({ code: "CONTENTION", transient: true });
		});

		// The hold is gone once its transaction ends
		await local.fiscus.transactions.deposit({ accountId: account.id, amount: 100 });
		await assertAccountBalance(local.fiscus, account.id, 100);
		await local.cleanup();
	});
});
