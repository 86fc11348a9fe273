import { emptyLender } from "../core/index.js";
import { MemoryLedgerStore } from "./memory-store.js";
import { LedgerSession } from "./session.js";

describe("LedgerSession", () => {
	let store: MemoryLedgerStore;

	beforeEach(async () => {
		store = new MemoryLedgerStore();
		await store.apply({
			lenders: [{ account: "alice", amountSupplied: 100n, depositTimestamp: 10 }],
			borrowers: [],
			pool: { totalSupplied: 100n, totalBorrowed: 0n, reserves: 0n, feesPaid: 0n },
		});
	});

	it("should return zeroed records for unknown accounts", async () => {
		const session = new LedgerSession(store);
		expect(await session.findLender("bob")).toBeNull();
		expect(await session.getLender("bob")).toEqual(emptyLender("bob"));
		expect(await session.findBorrower("bob")).toBeNull();
	});

	it("should hand out copies", async () => {
		const session = new LedgerSession(store);
		const lender = await session.getLender("alice");
		lender.amountSupplied = 1n;
		expect((await session.getLender("alice")).amountSupplied).toBe(100n);
	});

	it("should refuse writes to records it has not read", () => {
		const session = new LedgerSession(store);
		expect(() => session.putLender(emptyLender("bob"))).toThrow(
			expect.objectContaining({ code: "UNREAD_RECORD" }),
		);
	});

	it("should keep staged writes out of the store until commit", async () => {
		const session = new LedgerSession(store);
		const lender = await session.getLender("alice");
		session.putLender({ ...lender, amountSupplied: 150n });

		expect((await session.getLender("alice")).amountSupplied).toBe(150n);
		expect((await store.getLender("alice"))?.amountSupplied).toBe(100n);

		await session.commit();
		expect((await store.getLender("alice"))?.amountSupplied).toBe(150n);
	});

	it("should list only dirty records as changes", async () => {
		const session = new LedgerSession(store);
		await session.getLender("alice");
		const pool = await session.getPool();
		session.putPool({ ...pool, reserves: 5n });

		expect(session.changes()).toEqual({
			lenders: [],
			borrowers: [],
			pool: { totalSupplied: 100n, totalBorrowed: 0n, reserves: 5n, feesPaid: 0n },
		});
	});

	it("should restore originals and drop created records on revert", async () => {
		const session = new LedgerSession(store);
		const alice = await session.getLender("alice");
		const bob = await session.getLender("bob");
		const pool = await session.getPool();
		session.putLender({ ...alice, amountSupplied: 0n });
		session.putLender({ ...bob, amountSupplied: 40n });
		session.putPool({ ...pool, totalSupplied: 40n });
		await session.commit();

		await session.revert();

		expect(await store.getLender("alice")).toEqual({
			account: "alice",
			amountSupplied: 100n,
			depositTimestamp: 10,
		});
		expect(await store.getLender("bob")).toBeNull();
		expect((await store.getPool()).totalSupplied).toBe(100n);
	});

	it("should close the session after a revert", async () => {
		const session = new LedgerSession(store);
		const alice = await session.getLender("alice");
		await session.revert();

		expect(() => session.putLender(alice)).toThrow(
			expect.objectContaining({ code: "SESSION_CLOSED" }),
		);
		await expect(session.commit()).rejects.toMatchObject({
			code: "SESSION_CLOSED",
		});
	});
});
