import { MemoryValueLedger } from "./memory-value-ledger";

describe("MemoryValueLedger", () => {
	let ledger: MemoryValueLedger;

	beforeEach(() => {
		ledger = new MemoryValueLedger("escrow");
		ledger.mint("alice", 500);
	});

	it("moves value within the escrow's allowance and spends it", async () => {
		ledger.approveFrom("alice", "escrow", 300);

		expect(await ledger.transferFrom("alice", "escrow", 200)).toBe(true);
		expect(await ledger.balanceOf("alice")).toBe(300);
		expect(await ledger.balanceOf("escrow")).toBe(200);
		expect(await ledger.allowance("alice", "escrow")).toBe(100);

		expect(await ledger.transferFrom("alice", "escrow", 101)).toBe(false);
		expect(await ledger.balanceOf("alice")).toBe(300);
	});

	it("refuses transfers beyond the balance", async () => {
		ledger.approveFrom("alice", "escrow", 1000);
		expect(await ledger.transferFrom("alice", "bob", 501)).toBe(false);
		expect(ledger.totalSupply()).toBe(500);
	});

	it("needs the escrow's own approval to move escrow funds", async () => {
		await ledger.approve("escrow", 0);
		ledger.approveFrom("alice", "escrow", 500);
		await ledger.transferFrom("alice", "escrow", 500);

		expect(await ledger.transferFrom("escrow", "bob", 50)).toBe(false);
		expect(await ledger.approve("escrow", 50)).toBe(true);
		expect(await ledger.transferFrom("escrow", "bob", 50)).toBe(true);
		expect(await ledger.balanceOf("bob")).toBe(50);
		expect(ledger.totalSupply()).toBe(500);
	});
});
