/**
 * Quarterly interest and fee schedule.
 *
 * Loan age is bucketed into brackets whose upper bound is inclusive: a loan
 * exactly 90 days old is still in the first quarter. Past the last bounded
 * bracket the open-ended one applies.
 */

import {
	BPS_DENOMINATOR,
	DAY,
	DEFAULT_RATE_SCHEDULE,
	QuarterRate,
} from "../../core/index.js";

export interface ResolvedRate extends QuarterRate {
	/** 1-based bracket number (1 = first quarter) */
	quarter: number;
}

/**
 * Seconds since `borrowTimestamp`, never negative.
 */
export function loanAge(borrowTimestamp: number, now: number): number {
	return Math.max(0, now - borrowTimestamp);
}

/**
 * Find the bracket that applies to a loan of the given age.
 */
export function resolveRate(
	ageSeconds: number,
	schedule: readonly QuarterRate[] = DEFAULT_RATE_SCHEDULE,
): ResolvedRate {
	const index = schedule.findIndex(
		(bracket) => bracket.untilDay === null || ageSeconds <= bracket.untilDay * DAY,
	);
	// validateRateSchedule guarantees an open-ended last bracket
	const position = index === -1 ? schedule.length - 1 : index;
	return { ...schedule[position], quarter: position + 1 };
}

/**
 * Simple interest over `principal` at `bps`, rounded down.
 */
export function applyBps(principal: bigint, bps: number): bigint {
	return (principal * BigInt(bps)) / BPS_DENOMINATOR;
}
