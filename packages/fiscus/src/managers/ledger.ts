// =============================================================================
// TRANSACTION LEDGER -- Append-only, immutable transaction records
// =============================================================================
// Records are only ever created. Every append writes a mirrored TXN audit
// entry in the same transaction.

import type {
	FiscusContext,
	FiscusTransactionAdapter,
	TransactionRecord,
	TransactionType,
	Where,
} from "@fiscus/core";
import { FiscusError } from "@fiscus/core";
import { appendAudit } from "./audit-log.js";
import { MODELS, type RawTransactionRow, rawToTransaction } from "./rows.js";

export interface AppendTransactionParams {
	accountId: string;
	type: TransactionType;
	amount: number;
	counterpartyAccountId?: string | null;
	reference?: string | null;
	actor: string;
	batchId?: string | null;
}

export async function appendTransaction(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: AppendTransactionParams,
): Promise<TransactionRecord> {
	const { amount } = params;
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw FiscusError.invalidAmount(`Transaction amount must be a positive integer, got ${amount}`);
	}

	const row = await tx.create<RawTransactionRow>({
		model: MODELS.transaction,
		data: {
			id: ctx.identity.nextId("transaction"),
			accountId: params.accountId,
			type: params.type,
			amount,
			counterpartyAccountId: params.counterpartyAccountId ?? null,
			reference: params.reference ?? null,
			actor: params.actor,
			batchId: params.batchId ?? null,
			createdAt: ctx.clock(),
		},
	});
	const record = rawToTransaction(row);

	await appendAudit(ctx, tx, {
		actor: record.actor,
		action: "TXN",
		entityType: "ACCOUNT",
		entityId: record.accountId,
		details: {
			transactionId: record.id,
			type: record.type,
			amount: record.amount,
			counterpartyAccountId: record.counterpartyAccountId,
			reference: record.reference,
		},
	});

	return record;
}

/** Sum of amounts per account for one type within one batch. */
export async function sumByType(
	tx: FiscusTransactionAdapter,
	params: { type: TransactionType; batchId: string },
): Promise<Map<string, number>> {
	const rows = await tx.findMany<RawTransactionRow>({
		model: MODELS.transaction,
		where: [
			{ field: "type", operator: "eq", value: params.type },
			{ field: "batchId", operator: "eq", value: params.batchId },
		],
	});

	const totals = new Map<string, number>();
	for (const row of rows) {
		totals.set(row.accountId, (totals.get(row.accountId) ?? 0) + Number(row.amount));
	}
	return totals;
}

// =============================================================================
// READS
// =============================================================================

export async function getTransaction(
	ctx: FiscusContext,
	transactionId: string,
): Promise<TransactionRecord> {
	const row = await ctx.adapter.findOne<RawTransactionRow>({
		model: MODELS.transaction,
		where: [{ field: "id", operator: "eq", value: transactionId }],
	});
	if (!row) {
		throw FiscusError.notFound(`Transaction ${transactionId} not found`);
	}
	return rawToTransaction(row);
}

export interface TransactionListResult {
	transactions: TransactionRecord[];
	hasMore: boolean;
	total: number;
}

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;

/** Newest first. */
export async function listTransactions(
	ctx: FiscusContext,
	params: { accountId: string; type?: TransactionType; limit?: number; offset?: number },
): Promise<TransactionListResult> {
	const limit = Math.min(Math.max(params.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
	const offset = Math.max(params.offset ?? 0, 0);

	const where: Where[] = [{ field: "accountId", operator: "eq", value: params.accountId }];
	if (params.type) {
		where.push({ field: "type", operator: "eq", value: params.type });
	}

	const [rows, total] = await Promise.all([
		ctx.adapter.findMany<RawTransactionRow>({
			model: MODELS.transaction,
			where,
			sortBy: { field: "createdAt", direction: "desc" },
			limit,
			offset,
		}),
		ctx.adapter.count({ model: MODELS.transaction, where }),
	]);

	const transactions = rows.map(rawToTransaction);
	return { transactions, hasMore: offset + transactions.length < total, total };
}
