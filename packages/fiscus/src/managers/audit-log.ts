// =============================================================================
// AUDIT LOG -- Append-only record of every state-changing action
// =============================================================================
// Entries are written inside the same transaction as the change they
// describe. Each carries a hash of its content (HMAC when a secret is
// configured) that listing recomputes.

import type {
	AuditAction,
	AuditEntityType,
	AuditRecord,
	FiscusContext,
	FiscusTransactionAdapter,
	Where,
} from "@fiscus/core";
import { computeHash, verifyHash } from "@fiscus/core";
import { MODELS, type RawAuditRow, rawToAudit } from "./rows.js";

export interface AuditEntryInput {
	actor: string;
	action: AuditAction;
	entityType: AuditEntityType;
	entityId: string;
	details?: Record<string, unknown>;
}

function hashedContent(entry: {
	actor: string;
	action: AuditAction;
	entityType: AuditEntityType;
	entityId: string;
	details: Record<string, unknown>;
}): Record<string, unknown> {
	return {
		actor: entry.actor,
		action: entry.action,
		entityType: entry.entityType,
		entityId: entry.entityId,
		details: entry.details,
	};
}

export async function appendAudit(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	entry: AuditEntryInput,
): Promise<AuditRecord> {
	const details = entry.details ?? {};
	const entryHash = computeHash(
		hashedContent({ ...entry, details }),
		ctx.options.advanced.hmacSecret,
	);

	const row = await tx.create<RawAuditRow>({
		model: MODELS.audit,
		data: {
			id: ctx.identity.nextId("audit"),
			actor: entry.actor,
			action: entry.action,
			entityType: entry.entityType,
			entityId: entry.entityId,
			details,
			entryHash,
			createdAt: ctx.clock(),
		},
	});
	return rawToAudit(row);
}

// =============================================================================
// LISTING & VERIFICATION
// =============================================================================

export interface AuditListResult {
	entries: AuditRecord[];
	hasMore: boolean;
	total: number;
	/** Ids of listed entries whose stored hash no longer matches their content */
	tampered: string[];
}

export async function listAudit(
	ctx: FiscusContext,
	params: {
		entityType?: AuditEntityType;
		entityId?: string;
		action?: AuditAction;
		limit?: number;
		offset?: number;
	} = {},
): Promise<AuditListResult> {
	const limit = Math.min(Math.max(params.limit ?? 50, 1), 200);
	const offset = Math.max(params.offset ?? 0, 0);

	const where: Where[] = [];
	if (params.entityType) where.push({ field: "entityType", operator: "eq", value: params.entityType });
	if (params.entityId) where.push({ field: "entityId", operator: "eq", value: params.entityId });
	if (params.action) where.push({ field: "action", operator: "eq", value: params.action });

	const [rows, total] = await Promise.all([
		ctx.adapter.findMany<RawAuditRow>({
			model: MODELS.audit,
			where,
			sortBy: { field: "createdAt", direction: "asc" },
			limit,
			offset,
		}),
		ctx.adapter.count({ model: MODELS.audit, where }),
	]);

	const entries = rows.map(rawToAudit);
	const tampered: string[] = [];
	for (const entry of entries) {
		if (!verifyHash(hashedContent(entry), entry.entryHash, ctx.options.advanced.hmacSecret)) {
			tampered.push(entry.id);
			ctx.logger.error("Audit entry hash mismatch", {
				auditId: entry.id,
				entityType: entry.entityType,
				entityId: entry.entityId,
				action: entry.action,
			});
		}
	}

	return { entries, hasMore: offset + entries.length < total, total, tampered };
}
