// =============================================================================
// CATALOG LOOKUPS
// =============================================================================
// Account types and loan products are master data owned elsewhere. The engine
// only needs to turn a code into an id.

import type { CatalogLookup, FiscusAdapter } from "@fiscus/core";
import { MODELS } from "./rows.js";

export interface StaticCatalogConfig {
	/** Account-type code -> account-type id */
	accountTypes: Record<string, string>;
	/** Loan-product code -> product id */
	loanProducts?: Record<string, string>;
}

/** Fixed code -> id maps, for tests and deployments with a static catalog. */
export function createStaticCatalog(config: StaticCatalogConfig): CatalogLookup {
	const accountTypes = new Map(Object.entries(config.accountTypes));
	const loanProducts = new Map(Object.entries(config.loanProducts ?? {}));

	return {
		resolveAccountTypeId: async (code) => accountTypes.get(code) ?? null,
		resolveProductId: async (code) => loanProducts.get(code) ?? null,
	};
}

/** Reads the `account_type` and `loan_product` tables through the adapter. */
export function createAdapterCatalog(adapter: FiscusAdapter): CatalogLookup {
	const resolve = async (model: string, code: string): Promise<string | null> => {
		const row = await adapter.findOne<{ id: string }>({
			model,
			where: [{ field: "code", operator: "eq", value: code }],
		});
		return row?.id ?? null;
	};

	return {
		resolveAccountTypeId: (code) => resolve(MODELS.accountType, code),
		resolveProductId: (code) => resolve(MODELS.loanProduct, code),
	};
}
