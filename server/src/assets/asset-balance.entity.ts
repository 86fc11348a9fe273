import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/bigint.transformer";

@Entity("asset_balances")
@Unique("uq_asset_balances_asset_account", ["asset", "account"])
export class AssetBalance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text" })
	account!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	balance!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

@Entity("asset_allowances")
@Unique("uq_asset_allowances_asset_owner_spender", ["asset", "owner", "spender"])
export class AssetAllowance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text" })
	owner!: string;

	@Column({ type: "text" })
	spender!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}
