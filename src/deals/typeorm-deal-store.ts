/**
 * TypeORM Deal Store
 *
 * Persists deals, agreements and results in three tables. Multi-row
 * changes (a deal and its empty agreement, an agreement and the deal
 * state) are written in one transaction. better-sqlite3 runs every query
 * on a single connection, which cannot nest transactions, so transactions
 * from different deals are queued behind one store-wide lock.
 */

import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { Brackets, EntityManager, In, Repository } from "typeorm";
import { cursorToString } from "../common/dto/envelopes";
import { DealId } from "../common/deal.event";
import { EscrowError } from "../common/errors";
import { KeyedLock } from "../common/keyed-lock";
import { DealPage, DealQuery, DealStore } from "./deal-store";
import { nextState } from "./deal-state-machine";
import { diffTerms } from "./deal-terms";
import {
	Agreement,
	Deal,
	DealAction,
	DealRecord,
	DealResult,
	DealState,
	emptyCounts,
} from "./deal.types";
import {
	DealAgreementEntity,
	DealEntity,
	DealResultEntity,
} from "./deal.entity";

@Injectable()
export class TypeOrmDealStore implements DealStore {
	readonly kind = "typeorm";

	private readonly writes = new KeyedLock();

	constructor(
		@InjectRepository(DealEntity)
		private readonly deals: Repository<DealEntity>,
		@InjectRepository(DealAgreementEntity)
		private readonly agreements: Repository<DealAgreementEntity>,
		@InjectRepository(DealResultEntity)
		private readonly results: Repository<DealResultEntity>,
	) {}

	async isNegotiating(dealId: DealId): Promise<boolean> {
		return (await this.getState(dealId)) === "negotiating";
	}

	async hasDeal(dealId: DealId): Promise<boolean> {
		return this.deals.exists({ where: { dealId } });
	}

	async getDeal(dealId: DealId): Promise<Deal> {
		return toDeal(await this.requireDeal(this.deals.manager, dealId));
	}

	async addDeal(deal: Deal): Promise<Deal> {
		return this.inTransaction(async (em) => {
			const existing = await em.findOne(DealEntity, {
				where: { dealId: deal.dealId },
			});
			if (existing) {
				const mismatched = diffTerms(toDeal(existing), deal);
				if (mismatched.length > 0) {
					throw new EscrowError(
						"ParameterMismatch",
						`Deal ${deal.dealId} already exists with different ${mismatched.join(", ")}`,
						{ dealId: deal.dealId, mismatched },
					);
				}
				return toDeal(existing);
			}
			const persisted = await em.save(
				em.create(DealEntity, { ...deal, state: "negotiating" }),
			);
			await em.save(
				em.create(DealAgreementEntity, {
					dealId: deal.dealId,
					resourceProviderAgreed: false,
					jobCreatorAgreed: false,
					dealAgreedAt: 0,
				}),
			);
			return toDeal(persisted);
		});
	}

	async agreeResourceProvider(dealId: DealId, at: number): Promise<Agreement> {
		return this.agree(dealId, "resourceProviderAgreed", at);
	}

	async agreeJobCreator(dealId: DealId, at: number): Promise<Agreement> {
		return this.agree(dealId, "jobCreatorAgreed", at);
	}

	async isAgreement(dealId: DealId): Promise<boolean> {
		return (await this.getState(dealId)) === "agreement";
	}

	async getAgreement(dealId: DealId): Promise<Agreement> {
		return toAgreement(await this.requireAgreement(this.deals.manager, dealId));
	}

	async addResult(
		dealId: DealId,
		resultsId: string,
		instructionCount: number,
	): Promise<DealResult> {
		return this.inTransaction(async (em) => {
			const deal = await this.requireDeal(em, dealId);
			const state = nextState(dealId, deal.state, "add-result");
			const persisted = await em.save(
				em.create(DealResultEntity, { dealId, resultsId, instructionCount }),
			);
			await em.update(DealEntity, { dealId }, { state });
			return toResult(persisted);
		});
	}

	async getResult(dealId: DealId): Promise<DealResult | null> {
		const entity = await this.results.findOne({ where: { dealId } });
		return entity ? toResult(entity) : null;
	}

	async timeoutResult(dealId: DealId): Promise<void> {
		await this.transition(dealId, "timeout");
	}

	async acceptResult(dealId: DealId): Promise<void> {
		await this.transition(dealId, "accept-results");
	}

	async rejectResult(dealId: DealId): Promise<void> {
		await this.transition(dealId, "reject-results");
	}

	async getState(dealId: DealId): Promise<DealState> {
		const entity = await this.deals.findOne({
			where: { dealId },
			select: { id: true, state: true },
		});
		return entity?.state ?? "negotiating";
	}

	async getRecord(dealId: DealId): Promise<DealRecord | null> {
		const deal = await this.deals.findOne({ where: { dealId } });
		if (!deal) return null;
		const [agreement, result] = await Promise.all([
			this.requireAgreement(this.deals.manager, dealId),
			this.results.findOne({ where: { dealId } }),
		]);
		return toRecord(deal, agreement, result ?? undefined);
	}

	async listDeals(query: DealQuery): Promise<DealPage> {
		const take = Math.min(query.limit, 100);
		const qb = this.deals.createQueryBuilder("d");

		if (query.party !== undefined) {
			const party = query.party;
			qb.andWhere(
				new Brackets((w) => {
					w.where("d.resourceProvider = :party", { party }).orWhere(
						"d.jobCreator = :party",
						{ party },
					);
				}),
			);
		}
		if (query.state !== undefined) {
			qb.andWhere("d.state = :state", { state: query.state });
		}
		const total = await qb.getCount();

		// ids grow with creation time and sqlite stores createdAt at second
		// precision, so the id alone orders and pages the rows
		const idBefore = query.cursor?.idBefore;
		if (idBefore !== undefined) {
			qb.andWhere("d.id < :idBefore", { idBefore });
		}

		const rows = await qb
			.orderBy("d.id", "DESC")
			.take(take + 1)
			.getMany();
		const page = rows.slice(0, take);
		if (page.length === 0) {
			return { items: [], total };
		}

		const dealIds = page.map((r) => r.dealId);
		const [agreements, results] = await Promise.all([
			this.agreements.find({ where: { dealId: In(dealIds) } }),
			this.results.find({ where: { dealId: In(dealIds) } }),
		]);
		const agreementsById = new Map(agreements.map((a) => [a.dealId, a]));
		const resultsById = new Map(results.map((r) => [r.dealId, r]));

		const items: DealRecord[] = [];
		for (const row of page) {
			const agreement = agreementsById.get(row.dealId);
			if (!agreement) {
				throw new EscrowError(
					"DealNotFound",
					`Agreement for deal ${row.dealId} not found`,
					{ dealId: row.dealId },
				);
			}
			items.push(toRecord(row, agreement, resultsById.get(row.dealId)));
		}

		let nextCursor: string | undefined;
		if (rows.length > take) {
			const last = page[page.length - 1];
			nextCursor = cursorToString(last.createdAt.getTime(), last.id);
		}
		return { items, nextCursor, total };
	}

	async countByState(): Promise<Record<DealState, number>> {
		const rows = await this.deals
			.createQueryBuilder("d")
			.select("d.state", "state")
			.addSelect("COUNT(*)", "count")
			.groupBy("d.state")
			.getRawMany<{ state: DealState; count: string | number }>();
		const counts = emptyCounts();
		for (const row of rows) {
			counts[row.state] = Number(row.count);
		}
		return counts;
	}

	private async agree(
		dealId: DealId,
		flag: "resourceProviderAgreed" | "jobCreatorAgreed",
		at: number,
	): Promise<Agreement> {
		return this.inTransaction(async (em) => {
			const deal = await this.requireDeal(em, dealId);
			// validates the deal is still negotiating
			const whenComplete = nextState(dealId, deal.state, "agree");
			const agreement = await this.requireAgreement(em, dealId);
			if (agreement[flag]) {
				throw new EscrowError(
					"InvalidState",
					`${flag === "resourceProviderAgreed" ? "Resource provider" : "Job creator"} already agreed to deal ${dealId}`,
					{ dealId },
				);
			}
			agreement[flag] = true;
			if (agreement.resourceProviderAgreed && agreement.jobCreatorAgreed) {
				agreement.dealAgreedAt = at;
				await em.update(DealEntity, { dealId }, { state: whenComplete });
			}
			await em.save(agreement);
			return toAgreement(agreement);
		});
	}

	private async transition(dealId: DealId, action: DealAction): Promise<void> {
		await this.inTransaction(async (em) => {
			const deal = await this.requireDeal(em, dealId);
			const state = nextState(dealId, deal.state, action);
			await em.update(DealEntity, { dealId }, { state });
		});
	}

	private inTransaction<T>(work: (em: EntityManager) => Promise<T>): Promise<T> {
		return this.writes.run("transaction", () =>
			this.deals.manager.transaction(work),
		);
	}

	private async requireDeal(
		em: EntityManager,
		dealId: DealId,
	): Promise<DealEntity> {
		const entity = await em.findOne(DealEntity, { where: { dealId } });
		if (!entity) {
			throw new EscrowError("DealNotFound", `Deal ${dealId} not found`, {
				dealId,
			});
		}
		return entity;
	}

	private async requireAgreement(
		em: EntityManager,
		dealId: DealId,
	): Promise<DealAgreementEntity> {
		const entity = await em.findOne(DealAgreementEntity, {
			where: { dealId },
		});
		if (!entity) {
			throw new EscrowError("DealNotFound", `Deal ${dealId} not found`, {
				dealId,
			});
		}
		return entity;
	}
}

function toDeal(entity: DealEntity): Deal {
	return {
		dealId: entity.dealId,
		resourceProvider: entity.resourceProvider,
		jobCreator: entity.jobCreator,
		instructionPrice: entity.instructionPrice,
		timeout: entity.timeout,
		timeoutCollateral: entity.timeoutCollateral,
		jobCollateral: entity.jobCollateral,
		resultsCollateral: entity.resultsCollateral,
	};
}

function toAgreement(entity: DealAgreementEntity): Agreement {
	return {
		dealId: entity.dealId,
		resourceProviderAgreed: entity.resourceProviderAgreed,
		jobCreatorAgreed: entity.jobCreatorAgreed,
		dealAgreedAt: entity.dealAgreedAt,
	};
}

function toResult(entity: DealResultEntity): DealResult {
	return {
		dealId: entity.dealId,
		resultsId: entity.resultsId,
		instructionCount: entity.instructionCount,
	};
}

function toRecord(
	deal: DealEntity,
	agreement: DealAgreementEntity,
	result?: DealResultEntity,
): DealRecord {
	return {
		deal: toDeal(deal),
		agreement: toAgreement(agreement),
		result: result ? toResult(result) : undefined,
		state: deal.state,
		createdAt: deal.createdAt.getTime(),
		updatedAt: deal.updatedAt.getTime(),
	};
}
