import { Module } from "@nestjs/common";

import { CLOCK, SystemClock } from "../common/clock";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { DealsModule } from "../deals/deals.module";
import { LedgerModule } from "../ledger/ledger.module";
import { ValueTransferService } from "../ledger/value-transfer.service";
import { EscrowBindings } from "./escrow-bindings";
import { EscrowController } from "./escrow.controller";
import { EscrowService } from "./escrow.service";
import {
	NotImplementedDispositionPolicy,
	RESULT_DISPOSITION_POLICY,
} from "./result-disposition";

@Module({
	imports: [DealsModule, LedgerModule],
	providers: [
		{ provide: CLOCK, useClass: SystemClock },
		{
			provide: RESULT_DISPOSITION_POLICY,
			useClass: NotImplementedDispositionPolicy,
		},
		EscrowBindings,
		ValueTransferService,
		EscrowService,
		ServerSentEventsService,
	],
	controllers: [EscrowController],
	exports: [EscrowService, EscrowBindings, ServerSentEventsService, LedgerModule],
})
export class EscrowModule {}
