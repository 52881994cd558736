export const ESCROW_ERROR_CODES = [
	"InvalidState",
	"InvalidParty",
	"ParameterMismatch",
	"Unauthorized",
	"DealTimedOut",
	"DealNotTimedOut",
	"InsufficientBalance",
	"InsufficientAllowance",
	"TransferFailed",
	"NotImplemented",
	"DealNotFound",
] as const;
export type EscrowErrorCode = (typeof ESCROW_ERROR_CODES)[number];

/**
 * Error thrown by the escrow core.
 *
 * Every failure of a deal operation is reported with one of these codes;
 * the HTTP layer maps them to status codes in `EscrowExceptionFilter`.
 */
export class EscrowError extends Error {
	constructor(
		public readonly code: EscrowErrorCode,
		message: string,
		public readonly details?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "EscrowError";
	}
}

export function isEscrowError(
	err: unknown,
	code?: EscrowErrorCode,
): err is EscrowError {
	return err instanceof EscrowError && (code === undefined || err.code === code);
}

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}
