import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { EscrowError, EscrowErrorCode, toError } from "../errors";

export const ESCROW_ERROR_STATUS: Record<EscrowErrorCode, HttpStatus> = {
	DealNotFound: HttpStatus.NOT_FOUND,
	InvalidParty: HttpStatus.BAD_REQUEST,
	Unauthorized: HttpStatus.FORBIDDEN,
	InvalidState: HttpStatus.CONFLICT,
	ParameterMismatch: HttpStatus.CONFLICT,
	DealTimedOut: HttpStatus.UNPROCESSABLE_ENTITY,
	DealNotTimedOut: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientBalance: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientAllowance: HttpStatus.UNPROCESSABLE_ENTITY,
	NotImplemented: HttpStatus.NOT_IMPLEMENTED,
	TransferFailed: HttpStatus.BAD_GATEWAY,
};

/**
 * Renders every error as `{ statusCode, error, message, details? }`.
 * Escrow errors keep their code in `error`.
 */
@Catch()
export class EscrowExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(EscrowExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();

		if (exception instanceof EscrowError) {
			const statusCode = ESCROW_ERROR_STATUS[exception.code];
			if (statusCode >= 500) {
				this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
			}
			res.status(statusCode).json({
				statusCode,
				error: exception.code,
				message: exception.message,
				details: exception.details,
			});
			return;
		}

		if (exception instanceof HttpException) {
			const statusCode = exception.getStatus();
			const body = exception.getResponse();
			res
				.status(statusCode)
				.json(
					typeof body === "string"
						? { statusCode, message: body }
						: body,
				);
			return;
		}

		const error = toError(exception);
		this.logger.error(error.message, error.stack);
		res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: "Internal server error",
		});
	}
}
