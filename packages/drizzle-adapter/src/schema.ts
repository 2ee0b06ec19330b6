import { sql } from "drizzle-orm";
import {
	bigint,
	check,
	index,
	integer,
	jsonb,
	numeric,
	pgSchema,
	text,
	timestamp,
	varchar,
} from "drizzle-orm/pg-core";

// Ids come from the configured identity service, so they are opaque strings
// rather than database-generated UUIDs.

export const fiscusSchema = pgSchema("fiscus");

// =============================================================================
// 0. CATALOG (read-only master data)
// =============================================================================
// Maintained outside the engine. The adapter-backed catalog lookup reads these
// by code.

export const accountType = fiscusSchema.table("account_type", {
	id: varchar("id", { length: 64 }).primaryKey(),
	code: varchar("code", { length: 50 }).unique().notNull(),
	name: varchar("name", { length: 255 }).notNull(),
});

export type AccountTypeRow = typeof accountType.$inferSelect;

export const loanProduct = fiscusSchema.table("loan_product", {
	id: varchar("id", { length: 64 }).primaryKey(),
	code: varchar("code", { length: 50 }).unique().notNull(),
	name: varchar("name", { length: 255 }).notNull(),
	annualRateBp: integer("annual_rate_bp").notNull(),
	termMonths: integer("term_months").notNull(),
});

export type LoanProductRow = typeof loanProduct.$inferSelect;

// =============================================================================
// 1. ACCOUNT
// =============================================================================
// Single source of truth for balances. Only the engine's applyDelta writes
// `balance`; the CHECK constraint backs the non-negative invariant.

export const account = fiscusSchema.table(
	"account",
	{
		id: varchar("id", { length: 64 }).primaryKey(),
		accountNumber: varchar("account_number", { length: 32 }).unique().notNull(),
		customerId: varchar("customer_id", { length: 64 }).notNull(),
		branchId: varchar("branch_id", { length: 64 }).notNull(),
		accountTypeId: varchar("account_type_id", { length: 64 })
			.notNull()
			.references(() => accountType.id),
		balance: bigint("balance", { mode: "number" }).notNull().default(0),
		status: varchar("status", { length: 10 }).notNull().default("ACTIVE"),
		openedAt: timestamp("opened_at", { withTimezone: true }).notNull().defaultNow(),
		closedAt: timestamp("closed_at", { withTimezone: true }),
	},
	(table) => [
		check("chk_account_balance_non_negative", sql`${table.balance} >= 0`),
		check("chk_account_status", sql`${table.status} IN ('ACTIVE', 'FROZEN', 'CLOSED')`),
		index("idx_account_type_status").on(table.accountTypeId, table.status),
		index("idx_account_customer").on(table.customerId),
	],
);

export type AccountRow = typeof account.$inferSelect;
export type AccountInsert = typeof account.$inferInsert;

// =============================================================================
// 2. TRANSACTION LEDGER (append-only)
// =============================================================================

export const accountTransaction = fiscusSchema.table(
	"account_transaction",
	{
		id: varchar("id", { length: 64 }).primaryKey(),
		accountId: varchar("account_id", { length: 64 })
			.notNull()
			.references(() => account.id),
		type: varchar("type", { length: 20 }).notNull(),
		amount: bigint("amount", { mode: "number" }).notNull(),
		counterpartyAccountId: varchar("counterparty_account_id", { length: 64 }).references(
			() => account.id,
		),
		reference: text("reference"),
		actor: varchar("actor", { length: 100 }).notNull(),
		batchId: varchar("batch_id", { length: 128 }),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [
		check("chk_account_transaction_amount_positive", sql`${table.amount} > 0`),
		index("idx_account_transaction_account").on(table.accountId, table.createdAt),
		index("idx_account_transaction_batch").on(table.batchId, table.type),
	],
);

export type AccountTransactionRow = typeof accountTransaction.$inferSelect;
export type AccountTransactionInsert = typeof accountTransaction.$inferInsert;

// =============================================================================
// 3. AUDIT LOG (append-only, hashed)
// =============================================================================

export const auditLog = fiscusSchema.table(
	"audit_log",
	{
		id: varchar("id", { length: 64 }).primaryKey(),
		actor: varchar("actor", { length: 100 }).notNull(),
		action: varchar("action", { length: 20 }).notNull(),
		entityType: varchar("entity_type", { length: 20 }).notNull(),
		entityId: varchar("entity_id", { length: 128 }).notNull(),
		details: jsonb("details").notNull().default({}),
		entryHash: varchar("entry_hash", { length: 64 }).notNull(),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [
		index("idx_audit_log_entity").on(table.entityType, table.entityId),
		index("idx_audit_log_created").on(table.createdAt),
	],
);

export type AuditLogRow = typeof auditLog.$inferSelect;

// =============================================================================
// 4. LOANS
// =============================================================================

export const loan = fiscusSchema.table(
	"loan",
	{
		id: varchar("id", { length: 64 }).primaryKey(),
		customerId: varchar("customer_id", { length: 64 }).notNull(),
		branchId: varchar("branch_id", { length: 64 }).notNull(),
		productId: varchar("product_id", { length: 64 })
			.notNull()
			.references(() => loanProduct.id),
		principal: bigint("principal", { mode: "number" }).notNull(),
		disbursed: bigint("disbursed", { mode: "number" }).notNull().default(0),
		outstanding: bigint("outstanding", { mode: "number" }).notNull(),
		status: varchar("status", { length: 10 }).notNull().default("PENDING"),
		openedAt: timestamp("opened_at", { withTimezone: true }).notNull().defaultNow(),
		closedAt: timestamp("closed_at", { withTimezone: true }),
	},
	(table) => [
		check(
			"chk_loan_outstanding_range",
			sql`${table.outstanding} >= 0 AND ${table.outstanding} <= ${table.principal}`,
		),
		index("idx_loan_customer").on(table.customerId),
	],
);

export type LoanRow = typeof loan.$inferSelect;

export const loanPayment = fiscusSchema.table(
	"loan_payment",
	{
		id: varchar("id", { length: 64 }).primaryKey(),
		loanId: varchar("loan_id", { length: 64 })
			.notNull()
			.references(() => loan.id),
		amount: bigint("amount", { mode: "number" }).notNull(),
		method: varchar("method", { length: 10 }).notNull().default("TRANSFER"),
		reference: text("reference"),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [
		check("chk_loan_payment_amount_positive", sql`${table.amount} > 0`),
		index("idx_loan_payment_loan").on(table.loanId, table.createdAt),
	],
);

export type LoanPaymentRow = typeof loanPayment.$inferSelect;

// =============================================================================
// 5. INTEREST BATCHES
// =============================================================================
// One row per committed batch. A keyed batch id ("SAVINGS:2026-10") can only
// be posted once.

export const interestBatch = fiscusSchema.table("interest_batch", {
	id: varchar("id", { length: 128 }).primaryKey(),
	accountTypeId: varchar("account_type_id", { length: 64 })
		.notNull()
		.references(() => accountType.id),
	annualRatePercent: numeric("annual_rate_percent", { precision: 9, scale: 4 }).notNull(),
	postedCount: integer("posted_count").notNull(),
	totalInterest: bigint("total_interest", { mode: "number" }).notNull(),
	actor: varchar("actor", { length: 100 }).notNull(),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export type InterestBatchRow = typeof interestBatch.$inferSelect;
