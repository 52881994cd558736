import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { MemoryValueLedger } from "./memory-value-ledger";
import { RestValueLedger } from "./rest-value-ledger";
import { ValueLedger } from "./value-ledger";

export const VALUE_LEDGER = Symbol("VALUE_LEDGER");
export const ESCROW_ACCOUNT = Symbol("ESCROW_ACCOUNT");

@Module({
	providers: [
		{
			provide: ESCROW_ACCOUNT,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService): string =>
				cfg.get<string>("ESCROW_ACCOUNT", "escrow"),
		},
		{
			provide: MemoryValueLedger,
			inject: [ESCROW_ACCOUNT],
			useFactory: (account: string) => new MemoryValueLedger(account),
		},
		{
			provide: VALUE_LEDGER,
			inject: [ConfigService, ESCROW_ACCOUNT, MemoryValueLedger],
			useFactory: (
				cfg: ConfigService,
				account: string,
				memory: MemoryValueLedger,
			): ValueLedger => {
				const url = cfg.get<string>("VALUE_LEDGER_URL");
				if (!url) {
					Logger.log("VALUE_LEDGER_URL not set, using the in-memory ledger");
					return memory;
				}
				Logger.log(`VALUE_LEDGER_URL=${url}`);
				return new RestValueLedger(url, account);
			},
		},
	],
	exports: [VALUE_LEDGER, ESCROW_ACCOUNT, MemoryValueLedger],
})
export class LedgerModule {}
