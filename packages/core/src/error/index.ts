import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type FiscusErrorCode = BaseErrorCode;

export interface FiscusErrorOptions {
	cause?: unknown;
	details?: Record<string, unknown>;
}

export class FiscusError extends Error {
	readonly code: FiscusErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient: the same request may succeed if retried.
	 * Only lock contention is transient. The engine never retries on its own.
	 */
	readonly transient: boolean;

	constructor(
		code: FiscusErrorCode,
		message: string,
		options?: FiscusErrorOptions & { status?: number; transient?: boolean },
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? BASE_ERROR_CODES[code].status;
		this.transient = options?.transient ?? BASE_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "FiscusError";
	}

	/**
	 * Create a FiscusError from a typed error code, using the default message
	 * and status from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: FiscusErrorCode,
		options?: FiscusErrorOptions & { message?: string },
	): FiscusError {
		const raw = BASE_ERROR_CODES[code];
		return new FiscusError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	/** Wrap anything thrown by foreign code. FiscusErrors pass through untouched. */
	static from(error: unknown): FiscusError {
		if (error instanceof FiscusError) return error;
		const message = error instanceof Error ? error.message : String(error);
		return new FiscusError("INTERNAL", message, { cause: error });
	}

	static isCode(error: unknown, code: FiscusErrorCode): error is FiscusError {
		return error instanceof FiscusError && error.code === code;
	}

	// --- Transient ---

	static contention(message = "Lock could not be acquired in time", options?: FiscusErrorOptions) {
		return new FiscusError("CONTENTION", message, options);
	}

	// --- Preconditions ---

	static notFound(message = "Resource not found", options?: FiscusErrorOptions) {
		return new FiscusError("NOT_FOUND", message, options);
	}

	static accountNotActive(message = "Account is not active", options?: FiscusErrorOptions) {
		return new FiscusError("ACCOUNT_NOT_ACTIVE", message, options);
	}

	static loanNotActive(message = "Loan is not active", options?: FiscusErrorOptions) {
		return new FiscusError("LOAN_NOT_ACTIVE", message, options);
	}

	static invalidAmount(message = "Invalid amount", options?: FiscusErrorOptions) {
		return new FiscusError("INVALID_AMOUNT", message, options);
	}

	static insufficientFunds(message = "Insufficient funds", options?: FiscusErrorOptions) {
		return new FiscusError("INSUFFICIENT_FUNDS", message, options);
	}

	static selfTransfer(message = "Cannot transfer to same account", options?: FiscusErrorOptions) {
		return new FiscusError("SELF_TRANSFER", message, options);
	}

	static invalidArgument(message = "Invalid argument", options?: FiscusErrorOptions) {
		return new FiscusError("INVALID_ARGUMENT", message, options);
	}

	static duplicate(message = "Duplicate resource", options?: FiscusErrorOptions) {
		return new FiscusError("DUPLICATE", message, options);
	}

	static conflict(message = "Conflict", options?: FiscusErrorOptions) {
		return new FiscusError("CONFLICT", message, options);
	}

	// --- Integrity ---

	static invariantViolation(message = "Ledger invariant violated", options?: FiscusErrorOptions) {
		return new FiscusError("INVARIANT_VIOLATION", message, options);
	}

	static internal(message = "Internal error", options?: FiscusErrorOptions) {
		return new FiscusError("INTERNAL", message, options);
	}
}
