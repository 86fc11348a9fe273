import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	AssetTransferError,
	LedgerErrorCode,
	isLedgerError,
	toError,
} from "@collateral-ledger/ledger";

const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, HttpStatus> = {
	INVALID_AMOUNT: HttpStatus.BAD_REQUEST,
	INVALID_ACCOUNT: HttpStatus.BAD_REQUEST,
	INVALID_CONFIG: HttpStatus.BAD_REQUEST,
	UNAUTHORIZED: HttpStatus.FORBIDDEN,
	INSUFFICIENT_BALANCE: HttpStatus.UNPROCESSABLE_ENTITY,
	INSUFFICIENT_LIQUIDITY: HttpStatus.UNPROCESSABLE_ENTITY,
	COLLATERAL_LIMIT_EXCEEDED: HttpStatus.UNPROCESSABLE_ENTITY,
	NO_ACTIVE_LOAN: HttpStatus.UNPROCESSABLE_ENTITY,
	OVER_REPAYMENT: HttpStatus.UNPROCESSABLE_ENTITY,
	NOT_LIQUIDATABLE: HttpStatus.UNPROCESSABLE_ENTITY,
	REENTRANT_CALL: HttpStatus.CONFLICT,
	TRANSFER_FAILED: HttpStatus.PAYMENT_REQUIRED,
};

export type ErrorBody = {
	statusCode: number;
	code: string;
	message: string;
	details?: unknown;
};

/**
 * Maps ledger and asset errors to HTTP responses. Nest's own
 * `HttpException`s keep their status and message.
 */
@Catch()
export class LedgerExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(LedgerExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		res.status(body.statusCode).json(body);
	}

	private toBody(exception: unknown): ErrorBody {
		if (exception instanceof HttpException) {
			const response = exception.getResponse();
			const message =
				typeof response === "string"
					? response
					: "message" in response
						? response.message
						: exception.message;
			return {
				statusCode: exception.getStatus(),
				code: HttpStatus[exception.getStatus()] ?? "HTTP_ERROR",
				message: Array.isArray(message) ? message.join("; ") : String(message),
			};
		}

		if (isLedgerError(exception)) {
			return {
				statusCode: LEDGER_ERROR_STATUS[exception.code],
				code: exception.code,
				message: exception.message,
				details: exception.details,
			};
		}

		if (exception instanceof AssetTransferError) {
			return {
				statusCode:
					exception.code === "INVALID_AMOUNT"
						? HttpStatus.BAD_REQUEST
						: HttpStatus.UNPROCESSABLE_ENTITY,
				code: exception.code ?? "TRANSFER_REJECTED",
				message: exception.message,
				details: exception.details,
			};
		}

		const err = toError(exception);
		this.logger.error(`Unhandled error: ${err.message}`, err.stack);
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			code: "INTERNAL_SERVER_ERROR",
			message: "Internal server error",
		};
	}
}
