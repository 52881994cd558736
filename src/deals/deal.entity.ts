import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { DEAL_STATE, DealState } from "./deal.types";

@Entity("deals")
export class DealEntity {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	dealId!: string;

	@Index()
	@Column({ type: "text" })
	resourceProvider!: string;

	@Index()
	@Column({ type: "text" })
	jobCreator!: string;

	@Column({ type: "integer" })
	instructionPrice!: number;

	@Column({ type: "integer" })
	timeout!: number;

	@Column({ type: "integer" })
	timeoutCollateral!: number;

	@Column({ type: "integer" })
	jobCollateral!: number;

	@Column({ type: "integer" })
	resultsCollateral!: number;

	@Index()
	@Column({ type: "text", enum: DEAL_STATE })
	state!: DealState;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

@Entity("deal_agreements")
export class DealAgreementEntity {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	dealId!: string;

	@Column({ type: "boolean", default: false })
	resourceProviderAgreed!: boolean;

	@Column({ type: "boolean", default: false })
	jobCreatorAgreed!: boolean;

	/**
	 * Unix seconds, 0 until both parties agreed. Written once.
	 */
	@Column({ type: "integer", default: 0 })
	dealAgreedAt!: number;
}

@Entity("deal_results")
export class DealResultEntity {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	dealId!: string;

	@Column({ type: "text" })
	resultsId!: string;

	@Column({ type: "integer" })
	instructionCount!: number;

	@CreateDateColumn()
	createdAt!: Date;
}
