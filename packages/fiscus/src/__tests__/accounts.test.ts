import { createSequentialIdentity } from "@fiscus/core";
import { createSilentLogger } from "@fiscus/core/logger";
import {
	assertAccountBalance,
	getTestInstance,
	TEST_ACCOUNT_TYPES,
	TEST_EPOCH,
	type TestInstance,
} from "@fiscus/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Fiscus } from "../index.js";

describe("account lifecycle", () => {
	let instance: TestInstance;
	let fiscus: Fiscus;

	beforeEach(async () => {
		instance = await getTestInstance();
		fiscus = instance.fiscus;
	});

	afterEach(async () => {
		await instance.cleanup();
	});

	const openParams = { customerId: "cust-1", branchId: "branch-1", accountTypeCode: "SAVINGS" };

	// =========================================================================
	// OPEN
	// =========================================================================

	describe("open", () => {
		it("opens an ACTIVE account with a zero balance", async () => {
			const account = await fiscus.accounts.open(openParams);

			expect(account).toEqual({
				id: "account-000001",
				accountNumber: "AC00000001",
				customerId: "cust-1",
				branchId: "branch-1",
				accountTypeId: TEST_ACCOUNT_TYPES.SAVINGS,
				balance: 0,
				status: "ACTIVE",
				openedAt: new Date(TEST_EPOCH),
				closedAt: null,
			});
		});

		it("deposits the initial amount in the same transaction", async () => {
			const account = await fiscus.accounts.open({ ...openParams, initialDeposit: 50_000 });
			expect(account.balance).toBe(50_000);

			const ledger = await fiscus.transactions.list({ accountId: account.id });
			expect(ledger.transactions).toHaveLength(1);
			expect(ledger.transactions[0]).toMatchObject({
				type: "DEPOSIT",
				amount: 50_000,
				reference: "Initial Deposit",
			});
		});

		it("rejects an unknown account type", async () => {
			await expect(
				fiscus.accounts.open({ ...openParams, accountTypeCode: "GOLD" }),
			).rejects.toMatchObject({ code: "NOT_FOUND", message: 'Account type "GOLD" not found' });
		});

		it("rejects an empty customer id", async () => {
			await expect(
				fiscus.accounts.open({ ...openParams, customerId: "  " }),
			).rejects.toMatchObject({ code: "INVALID_ARGUMENT", message: "customerId must not be empty" });
		});

		it("rejects a malformed initial deposit before opening anything", async () => {
			await expect(
				fiscus.accounts.open({ ...openParams, initialDeposit: -5 }),
			).rejects.toMatchObject({ code: "INVALID_AMOUNT" });

			const ctx = await fiscus.$context;
			await expect(ctx.adapter.count({ model: "account" })).resolves.toBe(0);
		});

		it("finds an account by number", async () => {
			const account = await fiscus.accounts.open(openParams);
			await expect(fiscus.accounts.getByNumber("AC00000001")).resolves.toEqual(account);
			await expect(fiscus.accounts.getByNumber("AC99999999")).rejects.toMatchObject({
				code: "NOT_FOUND",
			});
		});

		it("rejects an account number that is already assigned", async () => {
			const sequential = createSequentialIdentity();
			const local = await getTestInstance({
				identity: {
					nextId: (kind) => sequential.nextId(kind),
					nextAccountNumber: () => "AC00000001",
				},
			});

			const first = await local.fiscus.accounts.open(openParams);
			await expect(
				local.fiscus.accounts.open({ ...openParams, customerId: "cust-2" }),
			).rejects.toMatchObject({
				code: "DUPLICATE",
				message: "Account number AC00000001 is already assigned",
			});

			await expect(local.fiscus.accounts.getByNumber("AC00000001")).resolves.toEqual(first);
			const created = await local.fiscus.audit.list({ entityType: "ACCOUNT", action: "CREATE" });
			expect(created.entries.map((e) => e.entityId)).toEqual([first.id]);
			await local.cleanup();
		});
	});

	// =========================================================================
	// FREEZE / UNFREEZE
	// =========================================================================

	describe("freeze and unfreeze", () => {
		it("freezes and unfreezes, auditing each change once", async () => {
			const account = await fiscus.accounts.open({ ...openParams, initialDeposit: 1_000 });

			const frozen = await fiscus.accounts.freeze({ accountId: account.id, reason: "KYC review" });
			expect(frozen.status).toBe("FROZEN");

			// Retrying is a no-op
			await fiscus.accounts.freeze({ accountId: account.id, reason: "KYC review" });
			const freezes = await fiscus.audit.list({ entityId: account.id, action: "FREEZE" });
			expect(freezes.total).toBe(1);
			expect(freezes.entries[0]?.details).toEqual({ reason: "KYC review" });

			const active = await fiscus.accounts.unfreeze({ accountId: account.id, actor: "ops-1" });
			expect(active.status).toBe("ACTIVE");
			const unfreezes = await fiscus.audit.list({ entityId: account.id, action: "UNFREEZE" });
			expect(unfreezes.entries.map((e) => [e.actor, e.details])).toEqual([["ops-1", { reason: null }]]);

			await fiscus.transactions.deposit({ accountId: account.id, amount: 500 });
			await assertAccountBalance(fiscus, account.id, 1_500);
		});

		it("refuses to freeze a closed account", async () => {
			const account = await fiscus.accounts.open(openParams);
			await fiscus.accounts.close({ accountId: account.id });

			await expect(fiscus.accounts.freeze({ accountId: account.id })).rejects.toMatchObject({
				code: "ACCOUNT_NOT_ACTIVE",
				message: `Account ${account.id} is closed`,
			});
		});
	});

	// =========================================================================
	// CLOSE
	// =========================================================================

	describe("close", () => {
		it("closes an empty account", async () => {
			const account = await fiscus.accounts.open(openParams);
			const closed = await fiscus.accounts.close({ accountId: account.id, reason: "moved away" });

			expect(closed.status).toBe("CLOSED");
			expect(closed.closedAt).toBeInstanceOf(Date);

			const audit = await fiscus.audit.list({ entityId: account.id, action: "CLOSE" });
			expect(audit.entries[0]?.details).toEqual({
				reason: "moved away",
				transferToAccountId: null,
				sweptAmount: 0,
			});
		});

		it("sweeps a funded account into the target before closing", async () => {
			const account = await fiscus.accounts.open({ ...openParams, initialDeposit: 10_000 });
			const target = await fiscus.accounts.open({ ...openParams, initialDeposit: 2_000 });

			const closed = await fiscus.accounts.close({
				accountId: account.id,
				transferToAccountId: target.id,
			});

			expect(closed.balance).toBe(0);
			expect(closed.status).toBe("CLOSED");
			await assertAccountBalance(fiscus, target.id, 12_000);

			const ledger = await fiscus.transactions.list({ accountId: account.id });
			expect(ledger.transactions[0]).toMatchObject({
				type: "TRANSFER_OUT",
				amount: 10_000,
				counterpartyAccountId: target.id,
				reference: `Account closure ${account.id}`,
			});

			const audit = await fiscus.audit.list({ entityId: account.id, action: "CLOSE" });
			expect(audit.entries[0]?.details).toEqual({
				reason: null,
				transferToAccountId: target.id,
				sweptAmount: 10_000,
			});
		});

		it("refuses to close a funded account without a sweep target", async () => {
			const account = await fiscus.accounts.open({ ...openParams, initialDeposit: 10_000 });

			await expect(fiscus.accounts.close({ accountId: account.id })).rejects.toMatchObject({
				code: "CONFLICT",
			});
			const after = await fiscus.accounts.get(account.id);
			expect(after.status).toBe("ACTIVE");
		});

		it("refuses to sweep an account into itself", async () => {
			const account = await fiscus.accounts.open({ ...openParams, initialDeposit: 10_000 });
			await expect(
				fiscus.accounts.close({ accountId: account.id, transferToAccountId: account.id }),
			).rejects.toMatchObject({ code: "SELF_TRANSFER" });
		});

		it("refuses to close a frozen account", async () => {
			const account = await fiscus.accounts.open(openParams);
			await fiscus.accounts.freeze({ accountId: account.id });

			await expect(fiscus.accounts.close({ accountId: account.id })).rejects.toMatchObject({
				code: "ACCOUNT_NOT_ACTIVE",
				message: `Account ${account.id} is FROZEN`,
			});
		});

		it("rolls the sweep back when the target cannot receive funds", async () => {
			const account = await fiscus.accounts.open({ ...openParams, initialDeposit: 10_000 });
			const target = await fiscus.accounts.open(openParams);
			await fiscus.accounts.freeze({ accountId: target.id });

			await expect(
				fiscus.accounts.close({ accountId: account.id, transferToAccountId: target.id }),
			).rejects.toMatchObject({ code: "ACCOUNT_NOT_ACTIVE" });

			const after = await fiscus.accounts.get(account.id);
			expect(after).toMatchObject({ status: "ACTIVE", balance: 10_000, closedAt: null });
		});
	});

	// =========================================================================
	// AUDIT LOG
	// =========================================================================

	describe("audit log", () => {
		it("writes CREATE and TXN entries for an opening deposit", async () => {
			const account = await fiscus.accounts.open({
				...openParams,
				initialDeposit: 500,
				actor: "teller-7",
			});

			const audit = await fiscus.audit.list({ entityType: "ACCOUNT", entityId: account.id });
			expect(audit.tampered).toEqual([]);
			expect(audit.entries.map((e) => [e.action, e.actor, e.details])).toEqual([
				["CREATE", "teller-7", { accountNumber: "AC00000001", accountTypeCode: "SAVINGS" }],
				[
					"TXN",
					"teller-7",
					{
						transactionId: "transaction-000001",
						type: "DEPOSIT",
						amount: 500,
						counterpartyAccountId: null,
						reference: "Initial Deposit",
					},
				],
			]);
			expect(audit.entries[0]?.entryHash).toMatch(/^[0-9a-f]{64}$/);
		});

		it("reports entries whose content no longer matches their hash", async () => {
			const logger = { ...createSilentLogger(), error: vi.fn() };
			const local = await getTestInstance({ logger });
			const account = await local.fiscus.accounts.open(openParams);

			const { entries } = await local.fiscus.audit.list({ entityId: account.id });
			const entry = entries[0];
			if (!entry) throw new Error("expected a CREATE entry");

			const ctx = await local.fiscus.$context;
			await ctx.adapter.update({
				model: "audit_log",
				where: [{ field: "id", operator: "eq", value: entry.id }],
				update: { actor: "someone-else" },
			});

			const after = await local.fiscus.audit.list({ entityId: account.id });
			expect(after.tampered).toEqual([entry.id]);
			expect(logger.error).toHaveBeenCalledWith("Audit entry hash mismatch", {
				auditId: entry.id,
				entityType: "ACCOUNT",
				entityId: account.id,
				action: "CREATE",
			});
			await local.cleanup();
		});

		it("pages through entries oldest first", async () => {
			const account = await fiscus.accounts.open(openParams);
			for (const amount of [1, 2, 3]) {
				await fiscus.transactions.deposit({ accountId: account.id, amount });
			}

			const page = await fiscus.audit.list({ entityId: account.id, limit: 2, offset: 1 });
			expect(page.total).toBe(4);
			expect(page.hasMore).toBe(true);
			expect(page.entries.map((e) => e.details.amount)).toEqual([1, 2]);
		});
	});
});
