import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import type { QuarterRate } from "@collateral-ledger/ledger";
import { bigintTransformer } from "../common/bigint.transformer";

@Entity("markets")
@Unique("uq_markets_external_id", ["externalId"])
export class Market {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text" })
	owner!: string;

	@Column({ type: "text" })
	baseAsset!: string;

	@Column({ type: "text" })
	collateralAsset!: string;

	@Column({ type: "integer" })
	collateralRatio!: number;

	@Column({ type: "integer", default: 0 })
	protocolFeeBps!: number;

	@Column({ type: "text" })
	feeRecipient!: string;

	@Column({ type: "simple-json", nullable: true })
	rateSchedule?: QuarterRate[] | null;

	// Pool state, written only through TypeOrmLedgerStore
	@Column({ type: "text", transformer: bigintTransformer })
	totalSupplied!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	totalBorrowed!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	reserves!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	feesPaid!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
