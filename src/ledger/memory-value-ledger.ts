import { ValueLedger } from "./value-ledger";

type Account = { balance: number; allowances: Map<string, number> };

/**
 * In-process token ledger.
 *
 * Backs the escrow when no external ledger is configured and serves as the
 * ledger double in tests. `mint` and `approveFrom` stand in for what a
 * party would do with their own wallet.
 */
export class MemoryValueLedger implements ValueLedger {
	readonly kind = "memory";
	private readonly accounts = new Map<string, Account>();

	constructor(readonly account: string) {}

	private acct(principal: string): Account {
		const a = this.accounts.get(principal);
		if (a) return a;
		const created: Account = { balance: 0, allowances: new Map() };
		this.accounts.set(principal, created);
		return created;
	}

	// --- test and bootstrap helpers ---
	mint(principal: string, amount: number): void {
		if (!isAmount(amount)) throw new Error("amount must be a non-negative integer");
		this.acct(principal).balance += amount;
	}

	/**
	 * `owner` grants `spender` an allowance, as the owner's wallet would.
	 */
	approveFrom(owner: string, spender: string, amount: number): void {
		if (!isAmount(amount)) throw new Error("amount must be a non-negative integer");
		this.acct(owner).allowances.set(spender, amount);
	}

	totalSupply(): number {
		let total = 0;
		for (const a of this.accounts.values()) total += a.balance;
		return total;
	}

	// --- ledger interface ---
	async balanceOf(principal: string): Promise<number> {
		return this.accounts.get(principal)?.balance ?? 0;
	}

	async allowance(owner: string, spender: string): Promise<number> {
		return this.accounts.get(owner)?.allowances.get(spender) ?? 0;
	}

	async transferFrom(from: string, to: string, amount: number): Promise<boolean> {
		if (!isAmount(amount)) return false;
		const source = this.acct(from);
		const allowed = source.allowances.get(this.account) ?? 0;
		if (source.balance < amount || allowed < amount) return false;
		source.allowances.set(this.account, allowed - amount);
		source.balance -= amount;
		this.acct(to).balance += amount;
		return true;
	}

	async approve(spender: string, amount: number): Promise<boolean> {
		if (!isAmount(amount)) return false;
		this.acct(this.account).allowances.set(spender, amount);
		return true;
	}
}

function isAmount(amount: number): boolean {
	return Number.isSafeInteger(amount) && amount >= 0;
}
