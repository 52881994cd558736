import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import { AuthenticatedRequest } from "./auth.guard";

/**
 * The principal authenticated by {@link AuthGuard}.
 */
export const PrincipalFromJwt = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!req.principal) {
			throw new UnauthorizedException("Not authenticated");
		}
		return req.principal;
	},
);
