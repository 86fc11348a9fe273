import { Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import type { LedgerEvent } from "@collateral-ledger/ledger";

/**
 * Writes every ledger event to the application log.
 */
@Injectable()
export class LedgerAuditListener {
	private readonly logger = new Logger("LedgerAudit");

	@OnEvent("ledger.*")
	onLedgerEvent(event: LedgerEvent) {
		const { eventId, marketId, occurredAt, ...rest } = event;
		this.logger.log(
			`[${marketId}] ${eventId} at ${occurredAt}: ${JSON.stringify(rest)}`,
		);
	}
}
