/**
 * Ledger error taxonomy.
 *
 * Every failure is local and synchronous from the ledger's point of view:
 * the operation aborts with no partial state change and the caller decides
 * whether to retry.
 */

export const LEDGER_ERROR_CODES = [
	"INVALID_AMOUNT",
	"INVALID_ACCOUNT",
	"INSUFFICIENT_BALANCE",
	"INSUFFICIENT_LIQUIDITY",
	"COLLATERAL_LIMIT_EXCEEDED",
	"NO_ACTIVE_LOAN",
	"OVER_REPAYMENT",
	"NOT_LIQUIDATABLE",
	"TRANSFER_FAILED",
	"REENTRANT_CALL",
	"UNAUTHORIZED",
	"INVALID_CONFIG",
] as const;
export type LedgerErrorCode = (typeof LEDGER_ERROR_CODES)[number];

/**
 * Error thrown by ledger operations.
 */
export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code: LedgerErrorCode,
		public readonly details?: unknown,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "LedgerError";
	}
}

/**
 * Narrows an unknown value to a LedgerError, optionally of a given code.
 */
export function isLedgerError(
	err: unknown,
	code?: LedgerErrorCode,
): err is LedgerError {
	return err instanceof LedgerError && (code === undefined || err.code === code);
}

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}
