import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/bigint.transformer";

@Entity("lender_positions")
@Unique("uq_lender_positions_market_account", ["marketId", "account"])
export class LenderPosition {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	marketId!: string;

	@Column({ type: "text" })
	account!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amountSupplied!: bigint;

	@Column({ type: "integer" })
	depositTimestamp!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

@Entity("borrower_positions")
@Unique("uq_borrower_positions_market_account", ["marketId", "account"])
export class BorrowerPosition {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	marketId!: string;

	@Column({ type: "text" })
	account!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amountBorrowed!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	initialBorrowAmount!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	collateralDeposited!: bigint;

	@Column({ type: "integer" })
	borrowTimestamp!: number;

	@Column({ type: "integer" })
	lastIteration!: number;

	@Column({ type: "text", transformer: bigintTransformer })
	amountRepaid!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
