import { Injectable, NestMiddleware } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual } from "node:crypto";

@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	private readonly expectedUser: string;
	private readonly expectedPass: string;

	constructor(config: ConfigService) {
		this.expectedUser = config.get<string>("BACKOFFICE_BASIC_USER") ?? "";
		this.expectedPass = config.get<string>("BACKOFFICE_BASIC_PASS") ?? "";
	}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			return challenge(res, "Authentication required");
		}
		// an unset password never authenticates
		if (this.expectedPass === "") {
			return challenge(res, "Unauthorized");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const ok =
			constantTimeEquals(username, this.expectedUser) &&
			constantTimeEquals(password, this.expectedPass);
		if (!ok) {
			return challenge(res, "Unauthorized");
		}
		return next();
	}
}

function challenge(res: Response, message: string) {
	res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
	return res.status(401).send(message);
}

function constantTimeEquals(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// burn the same time as a real comparison
		timingSafeEqual(bb, bb);
		return false;
	}
	return timingSafeEqual(ab, bb);
}
