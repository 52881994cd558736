import { Test } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource } from "typeorm";

import { CLOCK } from "../common/clock";
import {
	DEAL_AGREED_ID,
	DEAL_TIMEOUT_ID,
	JOB_CREATOR_AGREED_ID,
	RESOURCE_PROVIDER_AGREED_ID,
	RESULT_ACCEPTED_ID,
	RESULT_ADDED_ID,
} from "../common/deal.event";
import { EscrowError } from "../common/errors";
import {
	DealAgreementEntity,
	DealEntity,
	DealResultEntity,
} from "../deals/deal.entity";
import { MemoryDealStore } from "../deals/memory-deal-store";
import { TypeOrmDealStore } from "../deals/typeorm-deal-store";
import { DealRecord, DealTerms } from "../deals/deal.types";
import { MemoryValueLedger } from "../ledger/memory-value-ledger";
import { ValueTransferService } from "../ledger/value-transfer.service";
import {
	ESCROW,
	JC,
	ManualClock,
	RP,
	fund,
	makeTerms,
} from "../../test/utils";
import { EscrowBindings } from "./escrow-bindings";
import { EscrowService } from "./escrow.service";
import {
	NotImplementedDispositionPolicy,
	RESULT_DISPOSITION_POLICY,
	ResultDispositionPolicy,
} from "./result-disposition";

const T0 = 1_700_000_000;

describe("EscrowService", () => {
	let service: EscrowService;
	let store: MemoryDealStore;
	let ledger: MemoryValueLedger;
	let clock: ManualClock;
	let events: EventEmitter2;
	let emit: jest.SpyInstance;

	async function build(policy: ResultDispositionPolicy) {
		const moduleRef = await Test.createTestingModule({
			providers: [
				EscrowService,
				ValueTransferService,
				{
					provide: EscrowBindings,
					useValue: { dealStore: store, valueLedger: ledger },
				},
				{ provide: CLOCK, useValue: clock },
				{ provide: RESULT_DISPOSITION_POLICY, useValue: policy },
				{ provide: EventEmitter2, useValue: events },
			],
		}).compile();
		service = moduleRef.get(EscrowService);
	}

	beforeEach(async () => {
		store = new MemoryDealStore();
		ledger = new MemoryValueLedger(ESCROW);
		clock = new ManualClock(T0);
		events = new EventEmitter2();
		emit = jest.spyOn(events, "emit");
		await build(new NotImplementedDispositionPolicy());
	});

	const emitted = (eventId: string) =>
		emit.mock.calls.filter(([id]) => id === eventId).map(([, payload]) => payload);

	async function agreeBoth(dealId: string, terms: DealTerms = makeTerms()) {
		fund(ledger, RP, terms.timeoutCollateral);
		fund(ledger, JC, terms.jobCollateral);
		await service.agree(dealId, terms, RP);
		return service.agree(dealId, terms, JC);
	}

	describe("agree", () => {
		it("takes the resource provider's timeout collateral and creates the deal", async () => {
			fund(ledger, RP, 100);

			const agreement = await service.agree("deal-1", makeTerms(), RP);

			expect(agreement).toEqual({
				dealId: "deal-1",
				resourceProviderAgreed: true,
				jobCreatorAgreed: false,
				dealAgreedAt: 0,
			});
			expect(await ledger.balanceOf(ESCROW)).toBe(100);
			expect(await store.getState("deal-1")).toBe("negotiating");
			expect(emitted(RESOURCE_PROVIDER_AGREED_ID)).toEqual([
				expect.objectContaining({
					dealId: "deal-1",
					resourceProvider: RP,
					collateral: 100,
					agreedAt: new Date(T0 * 1000).toISOString(),
				}),
			]);
			expect(emitted(DEAL_AGREED_ID)).toEqual([]);
		});

		it("fires DealAgreed once, when the second party agrees", async () => {
			fund(ledger, JC, 200);
			await service.agree("deal-1", makeTerms(), JC);
			clock.advance(7);
			fund(ledger, RP, 100);
			const agreement = await service.agree("deal-1", makeTerms(), RP);

			expect(agreement.dealAgreedAt).toBe(T0 + 7);
			expect(await store.getState("deal-1")).toBe("agreement");
			expect(emitted(JOB_CREATOR_AGREED_ID)).toHaveLength(1);
			expect(emitted(DEAL_AGREED_ID)).toEqual([
				expect.objectContaining({ dealId: "deal-1", dealAgreedAt: T0 + 7 }),
			]);
		});

		it("re-confirms an earlier agreement without moving value", async () => {
			fund(ledger, RP, 300);
			await service.agree("deal-1", makeTerms(), RP);
			emit.mockClear();

			const again = await service.agree("deal-1", makeTerms(), RP);

			expect(again.resourceProviderAgreed).toBe(true);
			expect(await ledger.balanceOf(RP)).toBe(200);
			expect(await ledger.balanceOf(ESCROW)).toBe(100);
			expect(emit).not.toHaveBeenCalled();
		});

		it("rejects terms that differ from the stored deal", async () => {
			fund(ledger, RP, 100);
			fund(ledger, JC, 200);
			await service.agree("deal-1", makeTerms(), RP);

			await expect(
				service.agree("deal-1", makeTerms({ timeout: 60 }), JC),
			).rejects.toMatchObject({
				code: "ParameterMismatch",
				details: { dealId: "deal-1", fields: ["timeout"] },
			});
			expect(await ledger.balanceOf(JC)).toBe(200);
			expect(await store.getDeal("deal-1")).toEqual({
				dealId: "deal-1",
				...makeTerms(),
			});
		});

		it("rejects agreement once the deal left negotiation", async () => {
			await agreeBoth("deal-1");
			await expect(
				service.agree("deal-1", makeTerms(), RP),
			).rejects.toMatchObject({ code: "InvalidState" });
		});

		it("rejects missing or identical parties", async () => {
			await expect(
				service.agree("deal-1", makeTerms({ jobCreator: "" }), RP),
			).rejects.toMatchObject({ code: "InvalidParty" });
			await expect(
				service.agree("deal-1", makeTerms({ jobCreator: RP }), RP),
			).rejects.toMatchObject({ code: "InvalidParty" });
			expect(await store.hasDeal("deal-1")).toBe(false);
		});

		it("rejects principals with surrounding whitespace", async () => {
			await expect(
				service.agree("deal-1", makeTerms({ jobCreator: `${RP} ` }), RP),
			).rejects.toMatchObject({
				code: "InvalidParty",
				details: { party: `${RP} ` },
			});
			expect(await store.hasDeal("deal-1")).toBe(false);
		});

		it("rejects callers that are not a party", async () => {
			fund(ledger, "mallory", 500);
			await expect(
				service.agree("deal-1", makeTerms(), "mallory"),
			).rejects.toMatchObject({ code: "Unauthorized" });
			expect(await ledger.balanceOf(ESCROW)).toBe(0);
		});

		it("creates nothing when the collateral cannot be paid in", async () => {
			ledger.mint(RP, 100);

			await expect(
				service.agree("deal-1", makeTerms(), RP),
			).rejects.toMatchObject({ code: "InsufficientAllowance" });
			expect(await store.hasDeal("deal-1")).toBe(false);
			expect(emit).not.toHaveBeenCalled();
		});

		it("returns the collateral when the store commit fails", async () => {
			fund(ledger, RP, 100);
			jest
				.spyOn(store, "agreeResourceProvider")
				.mockRejectedValueOnce(new Error("disk full"));

			await expect(service.agree("deal-1", makeTerms(), RP)).rejects.toThrow(
				"disk full",
			);
			expect(await ledger.balanceOf(RP)).toBe(100);
			expect(await ledger.balanceOf(ESCROW)).toBe(0);
			expect(emitted(RESOURCE_PROVIDER_AGREED_ID)).toEqual([]);
		});

		it("needs a fresh approval before retrying a reversed agreement", async () => {
			fund(ledger, RP, 100);
			jest
				.spyOn(store, "agreeResourceProvider")
				.mockRejectedValueOnce(new Error("disk full"));
			await expect(service.agree("deal-1", makeTerms(), RP)).rejects.toThrow(
				"disk full",
			);

			expect(await ledger.allowance(RP, ESCROW)).toBe(0);
			await expect(
				service.agree("deal-1", makeTerms(), RP),
			).rejects.toMatchObject({ code: "InsufficientAllowance" });

			ledger.approveFrom(RP, ESCROW, 100);
			await service.agree("deal-1", makeTerms(), RP);
			expect(await ledger.balanceOf(ESCROW)).toBe(100);
		});

		it("serializes concurrent agreements on the same deal", async () => {
			fund(ledger, RP, 100);
			fund(ledger, JC, 200);

			await Promise.all([
				service.agree("deal-1", makeTerms(), RP),
				service.agree("deal-1", makeTerms(), JC),
			]);

			expect(emitted(DEAL_AGREED_ID)).toHaveLength(1);
			expect(await ledger.balanceOf(ESCROW)).toBe(300);
		});
	});

	describe("addResult", () => {
		it("accepts results up to the deadline and refuses them a second later", async () => {
			await agreeBoth("deal-1");
			await agreeBoth("deal-2");

			clock.set(T0 + 3600 + 1);
			await expect(
				service.addResult("deal-1", "res-1", 5, RP),
			).rejects.toMatchObject({ code: "DealTimedOut" });

			clock.set(T0 + 3600);
			await expect(service.addResult("deal-2", "res-2", 5, RP)).resolves.toEqual({
				dealId: "deal-2",
				resultsId: "res-2",
				instructionCount: 5,
			});
		});

		it("takes a positive collateral delta from the resource provider", async () => {
			const terms = makeTerms({ resultsCollateral: 150 });
			await agreeBoth("deal-1", terms);
			fund(ledger, RP, 50);

			await service.addResult("deal-1", "res-1", 5, RP);

			expect(await ledger.balanceOf(RP)).toBe(0);
			expect(await ledger.balanceOf(ESCROW)).toBe(350);
			expect(emitted(RESULT_ADDED_ID)).toEqual([
				expect.objectContaining({ dealId: "deal-1", collateralDelta: 50 }),
			]);
		});

		it("refunds a negative collateral delta to the resource provider", async () => {
			await agreeBoth("deal-1", makeTerms({ resultsCollateral: 60 }));

			await service.addResult("deal-1", "res-1", 5, RP);

			expect(await ledger.balanceOf(RP)).toBe(40);
			expect(await ledger.balanceOf(ESCROW)).toBe(260);
		});

		it("moves nothing when the collaterals match", async () => {
			await agreeBoth("deal-1");
			const transfer = jest.spyOn(ledger, "transferFrom");

			await service.addResult("deal-1", "res-1", 5, RP);

			expect(transfer).not.toHaveBeenCalled();
		});

		it("only accepts results from the resource provider", async () => {
			await agreeBoth("deal-1");
			await expect(
				service.addResult("deal-1", "res-1", 5, JC),
			).rejects.toMatchObject({ code: "Unauthorized" });
		});

		it("needs an agreed deal", async () => {
			fund(ledger, RP, 100);
			await service.agree("deal-1", makeTerms(), RP);
			await expect(
				service.addResult("deal-1", "res-1", 5, RP),
			).rejects.toMatchObject({ code: "InvalidState" });
			await expect(
				service.addResult("unknown", "res-1", 5, RP),
			).rejects.toMatchObject({ code: "InvalidState" });
		});

		it("reverses the delta when the result cannot be stored", async () => {
			await agreeBoth("deal-1", makeTerms({ resultsCollateral: 150 }));
			fund(ledger, RP, 50);
			jest.spyOn(store, "addResult").mockRejectedValueOnce(new Error("locked"));

			await expect(service.addResult("deal-1", "res-1", 5, RP)).rejects.toThrow(
				"locked",
			);
			expect(await ledger.balanceOf(RP)).toBe(50);
			expect(await ledger.balanceOf(ESCROW)).toBe(300);
			expect(await store.getState("deal-1")).toBe("agreement");
		});
	});

	describe("refundTimeout", () => {
		it("waits for the deadline to pass", async () => {
			await agreeBoth("deal-1");
			clock.set(T0 + 3600);
			await expect(service.refundTimeout("deal-1", JC)).rejects.toMatchObject({
				code: "DealNotTimedOut",
			});
		});

		it("refunds the job collateral and keeps the timeout collateral", async () => {
			await agreeBoth("deal-1");
			clock.set(T0 + 3601);

			const record = await service.refundTimeout("deal-1", JC);

			expect(record.state).toBe("timed-out");
			expect(await ledger.balanceOf(JC)).toBe(200);
			expect(await ledger.balanceOf(RP)).toBe(0);
			expect(await ledger.balanceOf(ESCROW)).toBe(100);
			expect(emitted(DEAL_TIMEOUT_ID)).toEqual([
				expect.objectContaining({ dealId: "deal-1", refunded: 200, forfeited: 100 }),
			]);
		});

		it("only refunds to the job creator", async () => {
			await agreeBoth("deal-1");
			clock.set(T0 + 3601);
			await expect(service.refundTimeout("deal-1", RP)).rejects.toMatchObject({
				code: "Unauthorized",
			});
			expect(await ledger.balanceOf(ESCROW)).toBe(300);
		});

		it("cannot time out a deal with results", async () => {
			await agreeBoth("deal-1");
			await service.addResult("deal-1", "res-1", 5, RP);
			clock.set(T0 + 9999);
			await expect(service.refundTimeout("deal-1", JC)).rejects.toMatchObject({
				code: "InvalidState",
			});
		});
	});

	describe("result disposition", () => {
		it("is not implemented by default and leaves the deal untouched", async () => {
			await agreeBoth("deal-1");
			await service.addResult("deal-1", "res-1", 5, RP);

			await expect(service.acceptResults("deal-1", JC)).rejects.toMatchObject({
				code: "NotImplemented",
			});
			await expect(service.rejectResults("deal-1", JC)).rejects.toMatchObject({
				code: "NotImplemented",
			});
			expect(await store.getState("deal-1")).toBe("results-submitted");
		});

		it("checks state and caller before asking the policy", async () => {
			const policy: ResultDispositionPolicy = {
				accept: jest.fn().mockResolvedValue(undefined),
				reject: jest.fn().mockResolvedValue(undefined),
			};
			await build(policy);
			await agreeBoth("deal-1");

			await expect(service.acceptResults("deal-1", JC)).rejects.toMatchObject({
				code: "InvalidState",
			});
			await service.addResult("deal-1", "res-1", 5, RP);
			await expect(service.acceptResults("deal-1", RP)).rejects.toMatchObject({
				code: "Unauthorized",
			});
			expect(policy.accept).not.toHaveBeenCalled();
		});

		it("moves the deal on when the policy agrees", async () => {
			const accept = jest.fn(
				async (_record: DealRecord, _caller: string): Promise<void> => {},
			);
			await build({ accept, reject: jest.fn() });
			await agreeBoth("deal-1");
			await service.addResult("deal-1", "res-1", 5, RP);

			const record = await service.acceptResults("deal-1", JC);

			expect(record.state).toBe("results-accepted");
			expect(accept).toHaveBeenCalledWith(
				expect.objectContaining({ state: "results-submitted" }),
				JC,
			);
			expect(emitted(RESULT_ACCEPTED_ID)).toHaveLength(1);
		});
	});

	describe("queries", () => {
		it("returns a deal only to its parties", async () => {
			await agreeBoth("deal-1");

			const record = await service.getDeal("deal-1", JC);
			expect(record.agreement.dealAgreedAt).toBe(T0);
			await expect(service.getDeal("deal-1", "mallory")).rejects.toMatchObject({
				code: "Unauthorized",
			});
			await expect(service.getDeal("missing")).rejects.toBeInstanceOf(EscrowError);
		});

		it("caps page sizes", async () => {
			const listDeals = jest.spyOn(store, "listDeals");
			await service.listDeals(RP, { limit: 5000 });
			expect(listDeals).toHaveBeenCalledWith({
				party: RP,
				state: undefined,
				limit: 100,
				cursor: undefined,
			});
		});

		it("reports the escrow balance and deal counts", async () => {
			await agreeBoth("deal-1");
			fund(ledger, RP, 100);
			await service.agree("deal-2", makeTerms(), RP);

			expect(await service.escrowBalance()).toEqual({ account: ESCROW, balance: 400 });
			const stats = await service.getStats();
			expect(stats.total).toBe(2);
			expect(stats.byState.agreement).toBe(1);
			expect(stats.byState.negotiating).toBe(1);
		});
	});

	it("holds 300 in escrow after a full deal with matching collaterals", async () => {
		const terms = makeTerms();
		fund(ledger, RP, 100);
		fund(ledger, JC, 200);

		await service.agree("deal-1", terms, RP);
		expect(await ledger.balanceOf(ESCROW)).toBe(100);
		await service.agree("deal-1", terms, JC);
		expect(await ledger.balanceOf(ESCROW)).toBe(300);
		expect(emitted(DEAL_AGREED_ID)).toHaveLength(1);

		clock.advance(1800);
		await service.addResult("deal-1", "res-1", 12, RP);

		expect(await store.getState("deal-1")).toBe("results-submitted");
		expect(await ledger.balanceOf(ESCROW)).toBe(300);
		expect(await ledger.balanceOf(RP)).toBe(0);
		expect(await ledger.balanceOf(JC)).toBe(0);
	});
});

describe("EscrowService on the TypeORM store", () => {
	let dataSource: DataSource;
	let store: TypeOrmDealStore;
	let ledger: MemoryValueLedger;
	let service: EscrowService;

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [DealEntity, DealAgreementEntity, DealResultEntity],
			synchronize: true,
		});
		await dataSource.initialize();
		store = new TypeOrmDealStore(
			dataSource.getRepository(DealEntity),
			dataSource.getRepository(DealAgreementEntity),
			dataSource.getRepository(DealResultEntity),
		);
		ledger = new MemoryValueLedger(ESCROW);
		const moduleRef = await Test.createTestingModule({
			providers: [
				EscrowService,
				ValueTransferService,
				{
					provide: EscrowBindings,
					useValue: { dealStore: store, valueLedger: ledger },
				},
				{ provide: CLOCK, useValue: new ManualClock(T0) },
				{
					provide: RESULT_DISPOSITION_POLICY,
					useValue: new NotImplementedDispositionPolicy(),
				},
				{ provide: EventEmitter2, useValue: new EventEmitter2() },
			],
		}).compile();
		service = moduleRef.get(EscrowService);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("agrees to different deals at the same time", async () => {
		fund(ledger, RP, 100);
		fund(ledger, JC, 200);

		const outcomes = await Promise.allSettled([
			service.agree("deal-a", makeTerms(), RP),
			service.agree("deal-b", makeTerms(), JC),
		]);

		expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "fulfilled"]);
		expect(await ledger.balanceOf(ESCROW)).toBe(300);
		expect(await store.getAgreement("deal-a")).toMatchObject({
			resourceProviderAgreed: true,
			jobCreatorAgreed: false,
		});
		expect(await store.getAgreement("deal-b")).toMatchObject({
			resourceProviderAgreed: false,
			jobCreatorAgreed: true,
		});
	});
});
