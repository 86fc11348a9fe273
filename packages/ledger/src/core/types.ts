/**
 * Core types for the collateral ledger
 *
 * Amounts are unsigned integers in the smallest unit of an asset and are
 * modelled as `bigint`. Timestamps are Unix seconds.
 */

import { LedgerError, LedgerErrorCode } from "./errors.js";

/**
 * Opaque account identity. Any non-empty string.
 */
export type AccountId = string;

/** 10000 basis points = 100%. */
export const BPS_DENOMINATOR = 10_000n;

/** Seconds in a day. */
export const DAY = 86_400;

/** Largest representable amount (2^256 - 1). Also the "infinite" ratio. */
export const MAX_AMOUNT = 2n ** 256n - 1n;

/** Lower and upper bounds (bp) for a market's collateral ratio. */
export const MIN_COLLATERAL_RATIO_BPS = 5_000;
export const MAX_COLLATERAL_RATIO_BPS = 9_500;

/**
 * Lender bookkeeping for one account.
 */
export interface LenderRecord {
	account: AccountId;
	/** Base asset currently supplied to the pool */
	amountSupplied: bigint;
	/** Time of the last deposit */
	depositTimestamp: number;
}

/**
 * Borrower bookkeeping for one account.
 */
export interface BorrowerRecord {
	account: AccountId;
	/** Outstanding principal */
	amountBorrowed: bigint;
	/** Cumulative principal ever drawn. Never decreases. */
	initialBorrowAmount: bigint;
	/** Collateral asset locked by the borrower */
	collateralDeposited: bigint;
	/** Start of the current loan, 0 when there is none */
	borrowTimestamp: number;
	/** Time of the last credit-affecting event */
	lastIteration: number;
	/** Cumulative principal repaid against `initialBorrowAmount` */
	amountRepaid: bigint;
}

/**
 * Pool-wide totals.
 */
export interface PoolState {
	/** Liquidity available for new borrows */
	totalSupplied: bigint;
	/** Outstanding principal across all borrowers */
	totalBorrowed: bigint;
	/** Interest retained by the pool after protocol fees */
	reserves: bigint;
	/** Cumulative fees sent to the fee recipient */
	feesPaid: bigint;
}

/**
 * Interest and fee rates (bp) for one quarter of a loan's life.
 */
export interface QuarterRate {
	/** Upper bound of the bracket in days (inclusive), null for open-ended */
	untilDay: number | null;
	interestBps: number;
	feeBps: number;
}

/**
 * Market configuration. Fixed at construction except for the fee recipient,
 * which only the owner may change.
 */
export interface MarketConfig {
	/** Identifier used in events */
	marketId: string;
	/** Privileged identity */
	owner: AccountId;
	/** Lendable asset identifier */
	baseAsset: string;
	/** Collateral asset identifier */
	collateralAsset: string;
	/** Maximum borrow against collateral, and liquidation threshold (bp) */
	collateralRatio: number;
	/** Advertised protocol fee (bp), informational */
	protocolFeeBps: number;
	/** Receives the fee charged when a loan closes */
	feeRecipient: AccountId;
	/** Quarterly schedule, defaults to {@link DEFAULT_RATE_SCHEDULE} */
	rateSchedule?: QuarterRate[];
}

/**
 * Default quarterly schedule.
 */
export const DEFAULT_RATE_SCHEDULE: readonly QuarterRate[] = [
	{ untilDay: 90, interestBps: 450, feeBps: 100 },
	{ untilDay: 180, interestBps: 800, feeBps: 150 },
	{ untilDay: 270, interestBps: 1050, feeBps: 200 },
	{ untilDay: null, interestBps: 1300, feeBps: 250 },
];

export function emptyLender(account: AccountId): LenderRecord {
	return { account, amountSupplied: 0n, depositTimestamp: 0 };
}

export function emptyBorrower(account: AccountId): BorrowerRecord {
	return {
		account,
		amountBorrowed: 0n,
		initialBorrowAmount: 0n,
		collateralDeposited: 0n,
		borrowTimestamp: 0,
		lastIteration: 0,
		amountRepaid: 0n,
	};
}

export function emptyPool(): PoolState {
	return { totalSupplied: 0n, totalBorrowed: 0n, reserves: 0n, feesPaid: 0n };
}

/**
 * Rejects zero, negative and out-of-range amounts.
 */
export function assertPositiveAmount(amount: bigint, field = "amount"): void {
	if (amount <= 0n || amount > MAX_AMOUNT) {
		throw new LedgerError(
			`${field} must be a positive integer not larger than 2^256 - 1`,
			"INVALID_AMOUNT",
			{ field, amount: amount.toString() },
		);
	}
}

/**
 * Rejects empty account identities.
 */
export function assertAccount(
	account: AccountId,
	field = "account",
	code: LedgerErrorCode = "INVALID_ACCOUNT",
): void {
	if (typeof account !== "string" || account.trim().length === 0) {
		throw new LedgerError(`${field} cannot be empty`, code, { field });
	}
}

function isBps(value: number, min: number, max: number): boolean {
	return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Validates a market configuration.
 *
 * @throws LedgerError with code `INVALID_CONFIG`
 */
export function validateMarketConfig(config: MarketConfig): void {
	for (const field of [
		"marketId",
		"owner",
		"baseAsset",
		"collateralAsset",
		"feeRecipient",
	] as const) {
		assertAccount(config[field], field, "INVALID_CONFIG");
	}

	if (config.baseAsset === config.collateralAsset) {
		throw new LedgerError(
			"Base and collateral assets must differ",
			"INVALID_CONFIG",
			{ field: "collateralAsset" },
		);
	}

	if (
		!isBps(
			config.collateralRatio,
			MIN_COLLATERAL_RATIO_BPS,
			MAX_COLLATERAL_RATIO_BPS,
		)
	) {
		throw new LedgerError(
			`Collateral ratio must be an integer between ${MIN_COLLATERAL_RATIO_BPS} and ${MAX_COLLATERAL_RATIO_BPS} bp, got ${config.collateralRatio}`,
			"INVALID_CONFIG",
			{ field: "collateralRatio" },
		);
	}

	if (!isBps(config.protocolFeeBps, 0, 10_000)) {
		throw new LedgerError(
			`Protocol fee must be an integer between 0 and 10000 bp, got ${config.protocolFeeBps}`,
			"INVALID_CONFIG",
			{ field: "protocolFeeBps" },
		);
	}

	if (config.rateSchedule) {
		validateRateSchedule(config.rateSchedule);
	}
}

/**
 * Brackets must be non-empty, strictly increasing, and end with an
 * open-ended bracket.
 */
export function validateRateSchedule(schedule: readonly QuarterRate[]): void {
	if (schedule.length === 0) {
		throw new LedgerError("Rate schedule cannot be empty", "INVALID_CONFIG", {
			field: "rateSchedule",
		});
	}

	let previous = 0;
	schedule.forEach((bracket, index) => {
		const isLast = index === schedule.length - 1;
		if (isLast !== (bracket.untilDay === null)) {
			throw new LedgerError(
				"Only the last rate bracket is open-ended",
				"INVALID_CONFIG",
				{ field: "rateSchedule", index },
			);
		}
		if (bracket.untilDay !== null) {
			if (!Number.isInteger(bracket.untilDay) || bracket.untilDay <= previous) {
				throw new LedgerError(
					"Rate brackets must have strictly increasing day bounds",
					"INVALID_CONFIG",
					{ field: "rateSchedule", index },
				);
			}
			previous = bracket.untilDay;
		}
		if (
			!isBps(bracket.interestBps, 0, 10_000) ||
			!isBps(bracket.feeBps, 0, 10_000)
		) {
			throw new LedgerError(
				"Rate bracket rates must be integers between 0 and 10000 bp",
				"INVALID_CONFIG",
				{ field: "rateSchedule", index },
			);
		}
	});
}
