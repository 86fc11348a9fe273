import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, map, Observable, Subject } from "rxjs";
import {
	LEDGER_BORROWED,
	LEDGER_COLLATERAL_DEPOSITED,
	LEDGER_COLLATERAL_WITHDRAWN,
	LEDGER_DEPOSITED,
	LEDGER_FEE_RECIPIENT_UPDATED,
	LEDGER_LIQUIDATED,
	LEDGER_REPAID,
	LEDGER_WITHDRAWN,
	type Borrowed,
	type CollateralDeposited,
	type CollateralWithdrawn,
	type Deposited,
	type FeeRecipientUpdated,
	type LedgerEvent,
	type LedgerEventName,
	type Liquidated,
	type Repaid,
	type Withdrawn,
} from "@collateral-ledger/ledger";

type LedgerSse = {
	type: LedgerEventName;
	event: LedgerEvent;
};

export type SseEvent<T> = {
	type: string;
	id: string;
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<LedgerSse>();

	marketEvents(marketId?: string): Observable<SseEvent<LedgerEvent>> {
		return this.events$.pipe(
			filter((e) => marketId === undefined || e.event.marketId === marketId),
			map((e) => ({ type: e.type, id: e.event.eventId, data: e.event })),
		);
	}

	@OnEvent(LEDGER_DEPOSITED)
	onDeposited(evt: Deposited) {
		this.events$.next({ type: LEDGER_DEPOSITED, event: evt });
	}

	@OnEvent(LEDGER_WITHDRAWN)
	onWithdrawn(evt: Withdrawn) {
		this.events$.next({ type: LEDGER_WITHDRAWN, event: evt });
	}

	@OnEvent(LEDGER_COLLATERAL_DEPOSITED)
	onCollateralDeposited(evt: CollateralDeposited) {
		this.events$.next({ type: LEDGER_COLLATERAL_DEPOSITED, event: evt });
	}

	@OnEvent(LEDGER_COLLATERAL_WITHDRAWN)
	onCollateralWithdrawn(evt: CollateralWithdrawn) {
		this.events$.next({ type: LEDGER_COLLATERAL_WITHDRAWN, event: evt });
	}

	@OnEvent(LEDGER_BORROWED)
	onBorrowed(evt: Borrowed) {
		this.events$.next({ type: LEDGER_BORROWED, event: evt });
	}

	@OnEvent(LEDGER_REPAID)
	onRepaid(evt: Repaid) {
		this.events$.next({ type: LEDGER_REPAID, event: evt });
	}

	@OnEvent(LEDGER_LIQUIDATED)
	onLiquidated(evt: Liquidated) {
		this.events$.next({ type: LEDGER_LIQUIDATED, event: evt });
	}

	// Admin events
	@OnEvent(LEDGER_FEE_RECIPIENT_UPDATED)
	onFeeRecipientUpdated(evt: FeeRecipientUpdated) {
		this.events$.next({ type: LEDGER_FEE_RECIPIENT_UPDATED, event: evt });
	}
}
