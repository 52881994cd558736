import { Logger } from "@nestjs/common";
import { ValueLedger } from "./value-ledger";

const DEFAULT_TIMEOUT_MS = 10_000;

export class LedgerRequestError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "LedgerRequestError";
	}
}

/**
 * Client for a token ledger reachable over HTTP.
 *
 * Endpoints, relative to `baseUrl`:
 * - `GET  /accounts/:principal/balance` → `{ balance }`
 * - `GET  /accounts/:owner/allowances/:spender` → `{ allowance }`
 * - `POST /transfers` `{ spender, from, to, amount }` → `{ ok }`
 * - `POST /approvals` `{ owner, spender, amount }` → `{ ok }`
 *
 * Every request is bounded by `timeoutMs`; nothing is retried.
 */
export class RestValueLedger implements ValueLedger {
	readonly kind = "rest";
	private readonly logger = new Logger(RestValueLedger.name);
	readonly baseUrl: string;

	constructor(
		baseUrl: string,
		readonly account: string,
		private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
	) {
		this.baseUrl = baseUrl.replace(/\/+$/, "");
	}

	async balanceOf(principal: string): Promise<number> {
		const body = await this.request(
			"GET",
			`/accounts/${encodeURIComponent(principal)}/balance`,
		);
		return readAmount(body, "balance");
	}

	async allowance(owner: string, spender: string): Promise<number> {
		const body = await this.request(
			"GET",
			`/accounts/${encodeURIComponent(owner)}/allowances/${encodeURIComponent(spender)}`,
		);
		return readAmount(body, "allowance");
	}

	async transferFrom(from: string, to: string, amount: number): Promise<boolean> {
		const body = await this.request("POST", "/transfers", {
			spender: this.account,
			from,
			to,
			amount,
		});
		return readOk(body);
	}

	async approve(spender: string, amount: number): Promise<boolean> {
		const body = await this.request("POST", "/approvals", {
			owner: this.account,
			spender,
			amount,
		});
		return readOk(body);
	}

	private async request(
		method: "GET" | "POST",
		path: string,
		payload?: Record<string, unknown>,
	): Promise<unknown> {
		const url = `${this.baseUrl}${path}`;
		let response: Response;
		try {
			response = await fetch(url, {
				method,
				headers: payload ? { "Content-Type": "application/json" } : undefined,
				body: payload ? JSON.stringify(payload) : undefined,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (cause) {
			this.logger.error(`${method} ${url} failed`, cause);
			throw new LedgerRequestError(`Ledger unreachable at ${url}`, undefined, {
				cause,
			});
		}
		if (!response.ok) {
			throw new LedgerRequestError(
				`Ledger responded ${response.status} to ${method} ${path}`,
				response.status,
			);
		}
		return response.json();
	}
}

function readAmount(body: unknown, field: string): number {
	const value =
		typeof body === "object" && body !== null
			? Reflect.get(body, field)
			: undefined;
	if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
		throw new LedgerRequestError(`Ledger returned an invalid ${field}`);
	}
	return value;
}

function readOk(body: unknown): boolean {
	const ok =
		typeof body === "object" && body !== null
			? Reflect.get(body, "ok")
			: undefined;
	if (typeof ok !== "boolean") {
		throw new LedgerRequestError("Ledger returned an invalid transfer receipt");
	}
	return ok;
}
