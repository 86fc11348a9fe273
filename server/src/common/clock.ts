import { systemClock, type Clock } from "@collateral-ledger/ledger";

export const CLOCK = "CLOCK";

export const clockProvider = {
	provide: CLOCK,
	useValue: systemClock satisfies Clock,
};
