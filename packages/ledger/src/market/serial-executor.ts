/**
 * Single-writer queue.
 *
 * Tasks run one at a time in submission order. A task submitted from inside
 * a running task is rejected: queueing it would wait on the task that is
 * waiting on it.
 *
 * The running label follows the async context, so timers and callbacks
 * scheduled from inside a task still count as inside it after the task has
 * settled. Schedule such work through `release` so that it can queue its own
 * tasks.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { LedgerError } from "../core/index.js";

export class SerialExecutor {
	private tail: Promise<unknown> = Promise.resolve();
	private readonly running = new AsyncLocalStorage<string>();

	/**
	 * Name of the task whose async context we are in, if any.
	 */
	currentTask(): string | undefined {
		return this.running.getStore();
	}

	run<T>(label: string, task: () => Promise<T>): Promise<T> {
		const current = this.currentTask();
		if (current !== undefined) {
			return Promise.reject(
				new LedgerError(
					`Cannot start "${label}" while "${current}" is in progress`,
					"REENTRANT_CALL",
					{ operation: label, inProgress: current },
				),
			);
		}

		const result = this.tail.then(() => this.running.run(label, task));
		// The caller observes failures through `result`; the queue only
		// needs to know the task has settled.
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	/**
	 * Call `fn` outside of any task context. Timers, listeners and promise
	 * callbacks it schedules may call `run` once the current task is done.
	 */
	release<T>(fn: () => T): T {
		return this.running.exit(fn);
	}
}
