import { Injectable, Logger } from "@nestjs/common";
import { EscrowError, toError } from "../common/errors";
import { KeyedLock } from "../common/keyed-lock";
import { EscrowBindings } from "../escrow/escrow-bindings";
import { ValueLedger } from "./value-ledger";

/**
 * Moves value on the bound ledger on behalf of the escrow.
 *
 * Every movement checks balance and allowance first and runs under a
 * lock on the source principal, so two movements out of the same
 * account never interleave between check and transfer.
 */
@Injectable()
export class ValueTransferService {
	private readonly logger = new Logger(ValueTransferService.name);
	private readonly locks = new KeyedLock();

	constructor(private readonly bindings: EscrowBindings) {}

	get escrowAccount(): string {
		return this.bindings.valueLedger.account;
	}

	async balanceOf(principal: string): Promise<number> {
		try {
			return await this.bindings.valueLedger.balanceOf(principal);
		} catch (e) {
			throw this.transferFailed(`Cannot read the balance of ${principal}`, e);
		}
	}

	/**
	 * Pull `amount` from `from` into the escrow account.
	 */
	async payIn(from: string, amount: number): Promise<void> {
		await this.moveValue(from, this.escrowAccount, amount);
	}

	/**
	 * Release `amount` from the escrow account to `to`.
	 *
	 * The escrow first approves itself for `amount`, then moves it.
	 */
	async payOut(to: string, amount: number): Promise<void> {
		if (amount === 0) return;
		const ledger = this.bindings.valueLedger;
		const escrow = ledger.account;
		await this.locks.run(escrow, async () => {
			let approved: boolean;
			try {
				approved = await ledger.approve(escrow, amount);
			} catch (e) {
				throw this.transferFailed(`Approval of ${amount} failed`, e);
			}
			if (!approved) {
				throw new EscrowError("TransferFailed", "Ledger refused the approval", {
					spender: escrow,
					amount,
				});
			}
			await this.move(ledger, escrow, to, amount);
		});
	}

	/**
	 * @throws EscrowError `InsufficientBalance`, `InsufficientAllowance` or `TransferFailed`
	 */
	async moveValue(from: string, to: string, amount: number): Promise<void> {
		if (amount === 0) return;
		const ledger = this.bindings.valueLedger;
		await this.locks.run(from, () => this.move(ledger, from, to, amount));
	}

	private async move(
		ledger: ValueLedger,
		from: string,
		to: string,
		amount: number,
	): Promise<void> {
		if (!Number.isSafeInteger(amount) || amount < 0) {
			throw new EscrowError("TransferFailed", "Amount must be a non-negative integer", {
				amount,
			});
		}

		// the escrow's own funds are authorized by the approval in payOut
		const needsAllowance = from !== ledger.account;
		let balance: number;
		let allowance: number;
		try {
			[balance, allowance] = await Promise.all([
				ledger.balanceOf(from),
				needsAllowance ? ledger.allowance(from, ledger.account) : amount,
			]);
		} catch (e) {
			throw this.transferFailed(`Cannot read the account of ${from}`, e);
		}
		if (balance < amount) {
			throw new EscrowError("InsufficientBalance", `${from} cannot cover ${amount}`, {
				principal: from,
				balance,
				amount,
			});
		}
		if (allowance < amount) {
			throw new EscrowError(
				"InsufficientAllowance",
				`${from} has not approved ${amount} for the escrow`,
				{ principal: from, allowance, amount },
			);
		}

		let ok: boolean;
		try {
			ok = await ledger.transferFrom(from, to, amount);
		} catch (e) {
			throw this.transferFailed(`Transfer ${from} -> ${to} of ${amount} failed`, e);
		}
		if (!ok) {
			throw new EscrowError("TransferFailed", "Ledger refused the transfer", {
				from,
				to,
				amount,
			});
		}
		this.logger.debug(`moved ${amount} ${from} -> ${to}`);
	}

	private transferFailed(message: string, cause: unknown): EscrowError {
		const error = toError(cause);
		this.logger.error(message, error.stack);
		return new EscrowError("TransferFailed", message, { reason: error.message }, {
			cause: error,
		});
	}
}
