import {
	createParamDecorator,
	ExecutionContext,
	InternalServerErrorException,
} from "@nestjs/common";
import type { AccountRequest } from "./account.guard";

/**
 * The account resolved by `AccountGuard`.
 */
export const CallerAccount = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<AccountRequest>();
		if (!req.accountId) {
			throw new InternalServerErrorException("AccountGuard did not run");
		}
		return req.accountId;
	},
);
