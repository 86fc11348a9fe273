import { ValueTransformer } from "typeorm";

/**
 * Stores `bigint` amounts as decimal text. SQLite integers stop at 2^63 - 1,
 * ledger amounts go up to 2^256 - 1.
 */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | null | undefined) =>
		value === null || value === undefined ? value : value.toString(),
	from: (value: string | null) => (value === null ? null : BigInt(value)),
};
