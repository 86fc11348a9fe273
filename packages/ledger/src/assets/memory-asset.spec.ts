import { MemoryAsset } from "./memory-asset.js";

describe("MemoryAsset", () => {
	let asset: MemoryAsset;

	beforeEach(() => {
		asset = new MemoryAsset("USD", "custody");
		asset.mint("alice", 500n);
	});

	it("should require an allowance to pull", async () => {
		await expect(asset.pull("alice", 100n)).rejects.toMatchObject({
			code: "INSUFFICIENT_ALLOWANCE",
		});
		expect(asset.balanceOf("alice")).toBe(500n);
	});

	it("should consume the allowance it pulls against", async () => {
		asset.approve("alice", "custody", 300n);
		await asset.pull("alice", 100n);

		expect(asset.balanceOf("alice")).toBe(400n);
		expect(asset.balanceOf("custody")).toBe(100n);
		expect(asset.allowance("alice", "custody")).toBe(200n);
	});

	it("should fail a pull the balance cannot cover", async () => {
		asset.approve("alice", "custody", 1_000n);
		await expect(asset.pull("alice", 600n)).rejects.toMatchObject({
			code: "INSUFFICIENT_FUNDS",
		});
		expect(asset.allowance("alice", "custody")).toBe(1_000n);
	});

	it("should push out of custody", async () => {
		await expect(asset.push("bob", 1n)).rejects.toMatchObject({
			code: "INSUFFICIENT_FUNDS",
		});

		asset.mint("custody", 50n);
		await asset.push("bob", 20n);
		expect(asset.balanceOf("bob")).toBe(20n);
		expect(asset.balanceOf("custody")).toBe(30n);
	});

	it("should reject zero amounts", () => {
		expect(() => asset.mint("alice", 0n)).toThrow(
			expect.objectContaining({ code: "INVALID_AMOUNT" }),
		);
		expect(() => asset.approve("alice", "custody", -1n)).toThrow(
			expect.objectContaining({ code: "INVALID_AMOUNT" }),
		);
	});
});
