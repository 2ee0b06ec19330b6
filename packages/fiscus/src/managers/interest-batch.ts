// =============================================================================
// INTEREST BATCH -- Monthly interest for one account-type cohort
// =============================================================================
// One atomic unit in two phases:
//   1. compute: hold each cohort account in ascending id order, re-check it,
//      and append an INTEREST record tagged with the batch id;
//   2. apply: sum the batch's INTEREST records per account and move each
//      balance once.
// Rates are parsed exactly and interest is computed in BigInt.

import type {
	FiscusContext,
	InterestBatchResult,
	InterestPosting,
} from "@fiscus/core";
import { FiscusError, hashLockKey, lockOrder, parseScaledDecimal } from "@fiscus/core";
import { runOperation } from "../infrastructure/atomic.js";
import { applyDelta, findCohort, getForUpdate } from "./account-store.js";
import { appendAudit } from "./audit-log.js";
import { appendTransaction, sumByType } from "./ledger.js";
import { MODELS } from "./rows.js";
import { DEFAULT_ACTOR } from "./transaction-engine.js";

const RATE_SCALE = 4;
/** 12 months x 100 percent x 10^RATE_SCALE */
const MONTHLY_DIVISOR = 12_000_000n;

export interface InterestBatchParams {
	accountTypeCode: string;
	/** Annual rate in percent, e.g. 6 or "6.25". At most 4 decimal places. */
	annualRatePercent: number | string;
	actor?: string;
	/** Period key such as "2026-10". A keyed batch can be posted only once. */
	batchKey?: string;
}

/**
 * Parse an annual percentage rate into an integer scaled by 10^4.
 * Throws INVALID_ARGUMENT for malformed, over-precise or negative rates.
 */
export function parseAnnualRate(rate: number | string): bigint {
	const scaled = parseScaledDecimal(rate, RATE_SCALE);
	const fine = parseScaledDecimal(rate, RATE_SCALE * 2);
	if (scaled === null || fine === null || fine !== scaled * 10n ** BigInt(RATE_SCALE)) {
		throw FiscusError.invalidArgument(
			`annualRatePercent must be a decimal with at most ${RATE_SCALE} places, got ${rate}`,
		);
	}
	if (scaled < 0n) {
		throw FiscusError.invalidArgument(`annualRatePercent must not be negative, got ${rate}`);
	}
	return scaled;
}

/** round_half_away(balance x rate / 1200) for a non-negative balance. */
export function computeMonthlyInterest(balance: number, rateScaled: bigint): number {
	const numerator = BigInt(balance) * rateScaled;
	let interest = numerator / MONTHLY_DIVISOR;
	if ((numerator % MONTHLY_DIVISOR) * 2n >= MONTHLY_DIVISOR) {
		interest += 1n;
	}
	return Number(interest);
}

export async function postInterestBatch(
	ctx: FiscusContext,
	params: InterestBatchParams,
): Promise<InterestBatchResult> {
	const { accountTypeCode, batchKey } = params;
	const rateScaled = parseAnnualRate(params.annualRatePercent);
	const rateText = String(params.annualRatePercent).trim();
	const actor = params.actor ?? DEFAULT_ACTOR;

	if (batchKey !== undefined && batchKey.trim().length === 0) {
		throw FiscusError.invalidArgument("batchKey must not be empty when provided");
	}

	const result = await runOperation(
		ctx,
		{
			type: "interest.batch",
			params: { accountTypeCode, annualRatePercent: rateText, batchKey },
		},
		async (tx) => {
			const accountTypeId = await ctx.catalog.resolveAccountTypeId(accountTypeCode);
			if (accountTypeId === null) {
				throw FiscusError.notFound(`Account type "${accountTypeCode}" not found`);
			}

			const batchId =
				batchKey !== undefined
					? `${accountTypeCode}:${batchKey}`
					: ctx.identity.nextId("interestBatch");

			// Serialise runs of the same key; the loser sees the winner's batch row.
			await tx.advisoryLock(hashLockKey(`interest:${batchId}`));
			const existing = await tx.findOne<{ id: string }>({
				model: MODELS.interestBatch,
				where: [{ field: "id", operator: "eq", value: batchId }],
			});
			if (existing) {
				throw FiscusError.duplicate(`Interest batch ${batchId} has already been posted`, {
					details: { batchId },
				});
			}

			// Phase 1: compute and record
			const postings: InterestPosting[] = [];
			for (const accountId of await findCohort(tx, accountTypeId)) {
				const account = await getForUpdate(tx, accountId);
				if (account.status !== "ACTIVE" || account.balance <= 0) continue;

				const interest = computeMonthlyInterest(account.balance, rateScaled);
				if (interest <= 0) continue;

				const record = await appendTransaction(ctx, tx, {
					accountId,
					type: "INTEREST",
					amount: interest,
					reference: `Monthly interest @${rateText}%`,
					actor,
					batchId,
				});
				postings.push({
					accountId,
					balanceBefore: account.balance,
					interest,
					transactionId: record.id,
				});
			}

			// Phase 2: apply
			const totals = await sumByType(tx, { type: "INTEREST", batchId });
			let totalInterest = 0;
			for (const accountId of lockOrder([...totals.keys()])) {
				const amount = totals.get(accountId) ?? 0;
				if (amount === 0) continue;
				await applyDelta(tx, accountId, amount);
				totalInterest += amount;
			}

			await tx.create({
				model: MODELS.interestBatch,
				data: {
					id: batchId,
					accountTypeId,
					annualRatePercent: rateText,
					postedCount: postings.length,
					totalInterest,
					actor,
					createdAt: ctx.clock(),
				},
			});
			await appendAudit(ctx, tx, {
				actor,
				action: "INTEREST_BATCH",
				entityType: "ACCOUNT_TYPE",
				entityId: accountTypeId,
				details: {
					batchId,
					accountTypeCode,
					annualRatePercent: rateText,
					postedCount: postings.length,
					totalInterest,
				},
			});

			return { batchId, postedCount: postings.length, totalInterest, postings };
		},
	);

	ctx.logger.info("Interest batch posted", {
		batchId: result.batchId,
		postedCount: result.postedCount,
		totalInterest: result.totalInterest,
	});
	return result;
}
