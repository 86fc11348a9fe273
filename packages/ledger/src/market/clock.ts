/**
 * Time source. Returns Unix seconds.
 */
export interface Clock {
	now(): number;
}

export const systemClock: Clock = {
	now: () => Math.floor(Date.now() / 1000),
};

/**
 * Manually driven clock for tests and simulations.
 */
export class ManualClock implements Clock {
	constructor(private current = 0) {}

	now(): number {
		return this.current;
	}

	set(seconds: number): void {
		this.current = seconds;
	}

	advance(seconds: number): void {
		this.current += seconds;
	}
}
