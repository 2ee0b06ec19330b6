import { describe, expect, it, vi } from "vitest";
import { buildWhereClause, keysToCamel, keysToSnake } from "../db/adapter-utils.js";
import { buildSqlAdapterMethods, type SqlExecutor } from "../db/sql-adapter-methods.js";
import { createTableResolver } from "../db/schema-prefix.js";

// =============================================================================
// HELPERS
// =============================================================================

function createExecutor(rows: Record<string, unknown>[] = []) {
	const query = vi.fn<SqlExecutor["query"]>(async () => rows);
	const advisoryLock = vi.fn<SqlExecutor["advisoryLock"]>(async () => {});
	return { query, advisoryLock };
}

// =============================================================================
// ADAPTER UTILS
// =============================================================================

describe("adapter utils", () => {
	it("converts keys between camelCase and snake_case", () => {
		expect(keysToSnake({ accountTypeId: "t", closedAt: null })).toEqual({
			account_type_id: "t",
			closed_at: null,
		});
		expect(keysToCamel({ counterparty_account_id: "b" })).toEqual({ counterpartyAccountId: "b" });
	});

	it("builds numbered conditions", () => {
		expect(
			buildWhereClause([
				{ field: "accountTypeId", operator: "eq", value: "t1" },
				{ field: "balance", operator: "gt", value: 0 },
				{ field: "status", operator: "in", value: ["ACTIVE", "FROZEN"] },
			]),
		).toEqual({
			clause: '"account_type_id" = $1 AND "balance" > $2 AND "status" IN ($3, $4)',
			params: ["t1", 0, "ACTIVE", "FROZEN"],
		});
	});

	it("starts numbering at the given index", () => {
		expect(buildWhereClause([{ field: "id", operator: "eq", value: "a" }], 3)).toEqual({
			clause: '"id" = $3',
			params: ["a"],
		});
	});

	it("renders an empty IN list as FALSE", () => {
		expect(buildWhereClause([{ field: "id", operator: "in", value: [] }])).toEqual({
			clause: "FALSE",
			params: [],
		});
	});

	it("rejects an IN condition without an array", () => {
		expect(() => buildWhereClause([{ field: "id", operator: "in", value: "a" }])).toThrow(TypeError);
	});

	it("qualifies tables with the schema", () => {
		expect(createTableResolver("fiscus")("account")).toBe('"fiscus"."account"');
		expect(createTableResolver("public")("account")).toBe('"account"');
	});
});

// =============================================================================
// CRUD BUILDER
// =============================================================================

describe("buildSqlAdapterMethods", () => {
	it("findOne with forUpdate appends FOR UPDATE", async () => {
		const executor = createExecutor([{ id: "a1", account_type_id: "t1" }]);
		const methods = buildSqlAdapterMethods(executor, () => "fiscus");

		const row = await methods.findOne<Record<string, unknown>>({
			model: "account",
			where: [{ field: "id", operator: "eq", value: "a1" }],
			forUpdate: true,
		});

		expect(executor.query).toHaveBeenCalledWith(
			'SELECT * FROM "fiscus"."account" WHERE "id" = $1 LIMIT 1 FOR UPDATE',
			["a1"],
		);
		expect(row).toEqual({ id: "a1", accountTypeId: "t1" });
	});

	it("findOne returns null when nothing matches", async () => {
		const methods = buildSqlAdapterMethods(createExecutor([]), () => "fiscus");
		const row = await methods.findOne({ model: "loan", where: [] });
		expect(row).toBeNull();
	});

	it("create inserts snake_case columns and returns camelCase", async () => {
		const executor = createExecutor([{ id: "l1", loan_id: "loan-1", amount: "500" }]);
		const methods = buildSqlAdapterMethods(executor, () => "public");

		const created = await methods.create({
			model: "loan_payment",
			data: { id: "l1", loanId: "loan-1", amount: 500 },
		});

		expect(executor.query).toHaveBeenCalledWith(
			'INSERT INTO "loan_payment" ("id", "loan_id", "amount") VALUES ($1, $2, $3) RETURNING *',
			["l1", "loan-1", 500],
		);
		expect(created).toEqual({ id: "l1", loanId: "loan-1", amount: "500" });
	});

	it("findMany adds ORDER BY, LIMIT and OFFSET after the where params", async () => {
		const executor = createExecutor([]);
		const methods = buildSqlAdapterMethods(executor, () => "fiscus");

		await methods.findMany({
			model: "account_transaction",
			where: [{ field: "accountId", operator: "eq", value: "a1" }],
			sortBy: { field: "createdAt", direction: "desc" },
			limit: 51,
			offset: 0,
		});

		expect(executor.query).toHaveBeenCalledWith(
			'SELECT * FROM "fiscus"."account_transaction" WHERE "account_id" = $1 ORDER BY "created_at" DESC LIMIT $2 OFFSET $3',
			["a1", 51, 0],
		);
	});

	it("update numbers SET params before WHERE params", async () => {
		const executor = createExecutor([{ id: "a1", balance: "100" }]);
		const methods = buildSqlAdapterMethods(executor, () => "fiscus");

		await methods.update({
			model: "account",
			where: [{ field: "id", operator: "eq", value: "a1" }],
			update: { balance: 100 },
		});

		expect(executor.query).toHaveBeenCalledWith(
			'UPDATE "fiscus"."account" SET "balance" = $1 WHERE "id" = $2 RETURNING *',
			[100, "a1"],
		);
	});

	it("update rejects empty data", async () => {
		const methods = buildSqlAdapterMethods(createExecutor(), () => "fiscus");
		await expect(methods.update({ model: "account", where: [], update: {} })).rejects.toThrow(
			"Cannot update account with empty data",
		);
	});

	it("count reads the count column", async () => {
		const executor = createExecutor([{ count: 7 }]);
		const methods = buildSqlAdapterMethods(executor, () => "fiscus");
		expect(await methods.count({ model: "audit_log" })).toBe(7);
	});

	it("advisoryLock delegates to the executor", async () => {
		const executor = createExecutor();
		const methods = buildSqlAdapterMethods(executor, () => "fiscus");
		await methods.advisoryLock(42);
		expect(executor.advisoryLock).toHaveBeenCalledWith(42);
	});
});
