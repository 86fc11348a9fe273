import {
	CanActivate,
	ExecutionContext,
	ForbiddenException,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { Request } from "express";

export const ACCOUNT_HEADER = "x-account-id";

// Colons are reserved for custody accounts (`market:<id>`)
const ACCOUNT_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

export type AccountRequest = Request & { accountId?: string };

/**
 * Resolves the calling account from the `x-account-id` header.
 */
@Injectable()
export class AccountGuard implements CanActivate {
	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<AccountRequest>();
		const header = req.header(ACCOUNT_HEADER);
		if (!header) {
			throw new UnauthorizedException(`Missing ${ACCOUNT_HEADER} header`);
		}
		if (!ACCOUNT_PATTERN.test(header)) {
			throw new UnauthorizedException(`Invalid ${ACCOUNT_HEADER} header`);
		}
		req.accountId = header;
		return true;
	}
}

/**
 * Restricts a route to the configured owner account. Use after
 * {@link AccountGuard}.
 */
@Injectable()
export class OwnerGuard implements CanActivate {
	constructor(private readonly config: ConfigService) {}

	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<AccountRequest>();
		if (req.accountId !== this.config.getOrThrow<string>("OWNER_ACCOUNT_ID")) {
			throw new ForbiddenException("Only the owner can do this");
		}
		return true;
	}
}
