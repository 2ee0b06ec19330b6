export type { Account, AccountStatus } from "./account.js";
export type { AuditAction, AuditEntityType, AuditRecord } from "./audit.js";
export type {
	CatalogLookup,
	Clock,
	EntityKind,
	IdentityService,
} from "./collaborators.js";
export type { FiscusAdvancedOptions, FiscusLogger, FiscusOptions } from "./config.js";
export type { FiscusContext, ResolvedAdvancedOptions, ResolvedFiscusOptions } from "./context.js";
export type { InterestBatchResult, InterestPosting } from "./interest.js";
export type { Loan, LoanPayment, LoanPaymentResult, LoanStatus, PaymentMethod } from "./loan.js";
export type {
	FiscusHookContext,
	FiscusOperation,
	FiscusOperationType,
	FiscusPlugin,
	FiscusWorkerDefinition,
} from "./plugin.js";
export type {
	FeePosting,
	TransactionRecord,
	TransactionType,
	TransferResult,
} from "./transaction.js";
