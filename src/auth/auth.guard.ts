import {
	CanActivate,
	ExecutionContext,
	Injectable,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import type { Request } from "express";

export type AuthenticatedRequest = Request & { principal?: string };

/**
 * Verifies `Authorization: Bearer <jwt>` and exposes the token's `sub`
 * as the calling principal.
 */
@Injectable()
export class AuthGuard implements CanActivate {
	private readonly logger = new Logger(AuthGuard.name);

	constructor(private readonly jwt: JwtService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const header = req.header("authorization");
		if (!header || !header.startsWith("Bearer ")) {
			throw new UnauthorizedException("Missing bearer token");
		}
		const token = header.slice("Bearer ".length).trim();

		let payload: { sub?: unknown };
		try {
			payload = await this.jwt.verifyAsync<{ sub?: unknown }>(token);
		} catch (e) {
			this.logger.debug("Invalid token", e);
			throw new UnauthorizedException("Invalid token");
		}
		if (typeof payload.sub !== "string" || payload.sub === "") {
			throw new UnauthorizedException("Token has no subject");
		}
		req.principal = payload.sub;
		return true;
	}
}
