import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import {
	BINDINGS_RECONFIGURED_ID,
	BindingsReconfigured,
} from "../common/deal.event";
import { EscrowError } from "../common/errors";
import { DealStore, DealStoreKind } from "../deals/deal-store";
import { MemoryDealStore } from "../deals/memory-deal-store";
import { TypeOrmDealStore } from "../deals/typeorm-deal-store";
import { ESCROW_ACCOUNT, VALUE_LEDGER } from "../ledger/ledger.module";
import { MemoryValueLedger } from "../ledger/memory-value-ledger";
import { RestValueLedger } from "../ledger/rest-value-ledger";
import { ValueLedger } from "../ledger/value-ledger";

export type BindingsDescription = {
	escrowAccount: string;
	dealStore: DealStoreKind;
	valueLedger: ValueLedger["kind"];
	valueLedgerUrl?: string;
};

export type ReconfigureInput = {
	dealStore?: DealStoreKind;
	/** Base URL of a REST ledger; `null` switches back to the in-memory ledger */
	valueLedgerUrl?: string | null;
};

/**
 * The DealStore and ValueLedger the escrow currently talks to.
 *
 * Bound once at startup from configuration; only the configured operator
 * may rebind them.
 */
@Injectable()
export class EscrowBindings {
	private readonly logger = new Logger(EscrowBindings.name);
	private readonly operator: string;
	private store: DealStore;
	private ledger: ValueLedger;

	constructor(
		configService: ConfigService,
		private readonly typeormStore: TypeOrmDealStore,
		private readonly memoryStore: MemoryDealStore,
		private readonly memoryLedger: MemoryValueLedger,
		@Inject(VALUE_LEDGER) ledger: ValueLedger,
		@Inject(ESCROW_ACCOUNT) readonly escrowAccount: string,
		private readonly events: EventEmitter2,
	) {
		const operator = configService.get<string>("ESCROW_OPERATOR");
		if (!operator) {
			throw new Error("ESCROW_OPERATOR is not set");
		}
		this.operator = operator;
		this.store =
			configService.get<string>("DEAL_STORE") === "memory"
				? memoryStore
				: typeormStore;
		this.ledger = ledger;
		this.logger.log(
			`ESCROW_ACCOUNT=${escrowAccount} DEAL_STORE=${this.store.kind} VALUE_LEDGER=${ledger.kind}`,
		);
	}

	get dealStore(): DealStore {
		return this.store;
	}

	get valueLedger(): ValueLedger {
		return this.ledger;
	}

	describe(): BindingsDescription {
		return {
			escrowAccount: this.escrowAccount,
			dealStore: this.store.kind,
			valueLedger: this.ledger.kind,
			valueLedgerUrl:
				this.ledger instanceof RestValueLedger ? this.ledger.baseUrl : undefined,
		};
	}

	/**
	 * Rebind the store and/or the ledger.
	 *
	 * @throws EscrowError `Unauthorized` unless `operator` is the configured operator
	 */
	reconfigure(operator: string, input: ReconfigureInput): BindingsDescription {
		if (operator !== this.operator) {
			throw new EscrowError(
				"Unauthorized",
				"Only the escrow operator can reconfigure the escrow",
				{ operator },
			);
		}
		if (input.dealStore !== undefined) {
			this.store =
				input.dealStore === "memory" ? this.memoryStore : this.typeormStore;
		}
		if (input.valueLedgerUrl === null) {
			this.ledger = this.memoryLedger;
		} else if (input.valueLedgerUrl !== undefined) {
			this.ledger = new RestValueLedger(input.valueLedgerUrl, this.escrowAccount);
		}

		const description = this.describe();
		this.logger.log(
			`Escrow reconfigured by ${operator}: store=${description.dealStore} ledger=${description.valueLedger}`,
		);
		this.events.emit(BINDINGS_RECONFIGURED_ID, {
			eventId: nanoid(4),
			operator,
			dealStore: description.dealStore,
			valueLedger: description.valueLedgerUrl ?? description.valueLedger,
			reconfiguredAt: new Date().toISOString(),
		} satisfies BindingsReconfigured);
		return description;
	}
}
