// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error the engine raises, with its HTTP-ish status and
// whether the caller may retry the same request unchanged.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether this error is transient (retrying the same request may succeed).
	 *
	 * - `true`: the condition is about other work in flight, e.g. a lock held
	 *   by a concurrent transaction.
	 * - `false` (default): the request itself is rejected in the current state.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient
	CONTENTION: { message: "Lock could not be acquired in time", status: 503, transient: true },

	// Precondition failures
	NOT_FOUND: { message: "Resource not found", status: 404, transient: false },
	ACCOUNT_NOT_ACTIVE: { message: "Account is not active", status: 403, transient: false },
	LOAN_NOT_ACTIVE: { message: "Loan is not active", status: 409, transient: false },
	INVALID_AMOUNT: { message: "Invalid amount", status: 400, transient: false },
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 422, transient: false },
	SELF_TRANSFER: { message: "Cannot transfer to same account", status: 400, transient: false },
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	DUPLICATE: { message: "Duplicate resource", status: 409, transient: false },
	CONFLICT: { message: "Resource conflict", status: 409, transient: false },

	// Integrity
	INVARIANT_VIOLATION: { message: "Ledger invariant violated", status: 500, transient: false },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
