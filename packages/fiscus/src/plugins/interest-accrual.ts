// =============================================================================
// INTEREST ACCRUAL PLUGIN: Scheduled monthly interest for one account type
// =============================================================================
// Posts the current month's batch on every run. The batch is keyed by the
// clock's UTC month, so repeated runs within a month (or a second process
// running the same worker) post nothing and log at debug level.

import type { FiscusPlugin } from "@fiscus/core";
import { FiscusError } from "@fiscus/core";
import { postInterestBatch } from "../managers/interest-batch.js";

// =============================================================================
// OPTIONS
// =============================================================================

export interface InterestAccrualOptions {
	accountTypeCode: string;
	/** Annual rate in percent, e.g. 6 or "6.25" */
	annualRatePercent: number | string;
	/** Polling interval. Default: "1h" */
	interval?: string;
	/** Actor recorded on the batch. Default: "SYSTEM:interest-accrual" */
	actor?: string;
}

/** "2026-10" for any instant in October 2026 (UTC). */
export function monthKey(date: Date): string {
	return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, "0")}`;
}

// =============================================================================
// PLUGIN FACTORY
// =============================================================================

export function interestAccrual(options: InterestAccrualOptions): FiscusPlugin {
	const { accountTypeCode, annualRatePercent } = options;
	const id = `interest-accrual:${accountTypeCode}`;

	return {
		id,

		workers: [
			{
				id,
				description: `Post monthly interest for ${accountTypeCode} accounts`,
				interval: options.interval ?? "1h",
				handler: async (ctx) => {
					const batchKey = monthKey(ctx.clock());
					try {
						await postInterestBatch(ctx, {
							accountTypeCode,
							annualRatePercent,
							actor: options.actor ?? "SYSTEM:interest-accrual",
							batchKey,
						});
					} catch (error) {
						if (FiscusError.isCode(error, "DUPLICATE")) {
							ctx.logger.debug("Interest already posted for period", {
								accountTypeCode,
								batchKey,
							});
							return;
						}
						throw error;
					}
				},
			},
		],
	};
}
