import { Injectable } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import { DataSource, EntityManager } from "typeorm";
import { SerialExecutor } from "@collateral-ledger/ledger";

/**
 * Runs database transactions one at a time.
 *
 * Markets serialise their own operations, but different markets share the
 * asset book and the single SQLite connection, which cannot nest
 * transactions.
 */
@Injectable()
export class TransactionsService {
	private readonly executor = new SerialExecutor();

	constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

	run<T>(label: string, work: (manager: EntityManager) => Promise<T>): Promise<T> {
		return this.executor.run(label, () => this.dataSource.transaction(work));
	}
}
