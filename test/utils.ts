import type { INestApplication } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { Clock } from "../src/common/clock";
import { DealTerms } from "../src/deals/deal.types";
import { MemoryValueLedger } from "../src/ledger/memory-value-ledger";

export const RP = "rp-alice";
export const JC = "jc-bob";
export const ESCROW = "escrow";

/**
 * Clock the test moves by hand.
 */
export class ManualClock implements Clock {
	constructor(private current = 1_700_000_000) {}

	now(): number {
		return this.current;
	}

	set(unixSeconds: number): void {
		this.current = unixSeconds;
	}

	advance(seconds: number): void {
		this.current += seconds;
	}
}

export function makeTerms(overrides: Partial<DealTerms> = {}): DealTerms {
	return {
		resourceProvider: RP,
		jobCreator: JC,
		instructionPrice: 10,
		timeout: 3600,
		timeoutCollateral: 100,
		jobCollateral: 200,
		resultsCollateral: 100,
		...overrides,
	};
}

/**
 * Give `principal` funds and approve the escrow to spend them, as the
 * party's wallet would before agreeing.
 */
export function fund(
	ledger: MemoryValueLedger,
	principal: string,
	amount: number,
	allowance: number = amount,
): void {
	ledger.mint(principal, amount);
	ledger.approveFrom(principal, ledger.account, allowance);
}

export async function jwtFor(
	app: INestApplication,
	principal: string,
): Promise<string> {
	return app.get(JwtService).signAsync({ sub: principal });
}
