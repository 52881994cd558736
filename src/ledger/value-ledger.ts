/**
 * Value Ledger
 *
 * The external, authoritative record of token balances and allowances.
 * A ledger client acts as one account (the escrow): `transferFrom` moves
 * value with that account's authority and `approve` grants allowances
 * from it. Allowances follow the usual token rules: moving value out of
 * an account, including the escrow's own, needs an allowance for the
 * escrow.
 */

export const VALUE_LEDGER_KINDS = ["memory", "rest"] as const;
export type ValueLedgerKind = (typeof VALUE_LEDGER_KINDS)[number];

export interface ValueLedger {
	readonly kind: ValueLedgerKind;

	/** The account this client spends as */
	readonly account: string;

	balanceOf(principal: string): Promise<number>;

	allowance(owner: string, spender: string): Promise<number>;

	/**
	 * Atomically move `amount` from `from` to `to`, spending `account`'s
	 * allowance on `from`.
	 *
	 * @returns false if the ledger refused the transfer
	 */
	transferFrom(from: string, to: string, amount: number): Promise<boolean>;

	/**
	 * Allow `spender` to move up to `amount` out of `account`.
	 */
	approve(spender: string, amount: number): Promise<boolean>;
}
