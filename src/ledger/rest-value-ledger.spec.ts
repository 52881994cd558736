import { LedgerRequestError, RestValueLedger } from "./rest-value-ledger";

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

describe("RestValueLedger", () => {
	const ledger = new RestValueLedger("http://ledger.test/", "escrow");
	let fetchMock: jest.SpiedFunction<typeof fetch>;

	beforeEach(() => {
		fetchMock = jest.spyOn(global, "fetch");
	});

	afterEach(() => {
		fetchMock.mockRestore();
	});

	it("reads balances and allowances", async () => {
		fetchMock
			.mockResolvedValueOnce(jsonResponse({ balance: 250 }))
			.mockResolvedValueOnce(jsonResponse({ allowance: 75 }));

		expect(await ledger.balanceOf("rp alice")).toBe(250);
		expect(await ledger.allowance("rp alice", "escrow")).toBe(75);

		expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
			"http://ledger.test/accounts/rp%20alice/balance",
			"http://ledger.test/accounts/rp%20alice/allowances/escrow",
		]);
	});

	it("posts transfers as the escrow account", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

		expect(await ledger.transferFrom("alice", "escrow", 100)).toBe(true);

		const [url, init] = fetchMock.mock.calls[0];
		expect(url).toBe("http://ledger.test/transfers");
		expect(init?.method).toBe("POST");
		expect(init?.body).toBe(
			JSON.stringify({ spender: "escrow", from: "alice", to: "escrow", amount: 100 }),
		);
	});

	it("posts approvals from the escrow account", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ ok: false }));

		expect(await ledger.approve("escrow", 30)).toBe(false);
		expect(fetchMock.mock.calls[0][1]?.body).toBe(
			JSON.stringify({ owner: "escrow", spender: "escrow", amount: 30 }),
		);
	});

	it("fails on error statuses and malformed bodies", async () => {
		fetchMock
			.mockResolvedValueOnce(jsonResponse({ error: "nope" }, 503))
			.mockResolvedValueOnce(jsonResponse({ balance: -1 }))
			.mockRejectedValueOnce(new TypeError("fetch failed"));

		await expect(ledger.balanceOf("alice")).rejects.toMatchObject({
			name: "LedgerRequestError",
			status: 503,
		});
		await expect(ledger.balanceOf("alice")).rejects.toThrow(
			"Ledger returned an invalid balance",
		);
		await expect(ledger.transferFrom("a", "b", 1)).rejects.toBeInstanceOf(
			LedgerRequestError,
		);
	});
});
