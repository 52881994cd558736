import { KeyedLock } from "./keyed-lock";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedLock", () => {
	it("runs tasks for the same key one at a time, in order", async () => {
		const lock = new KeyedLock();
		const log: string[] = [];
		let releaseFirst: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			releaseFirst = resolve;
		});

		const first = lock.run("deal-1", async () => {
			log.push("first:start");
			await gate;
			log.push("first:end");
		});
		const second = lock.run("deal-1", async () => {
			log.push("second");
		});

		await tick();
		expect(log).toEqual(["first:start"]);
		releaseFirst();
		await Promise.all([first, second]);
		expect(log).toEqual(["first:start", "first:end", "second"]);
	});

	it("runs tasks for different keys concurrently", async () => {
		const lock = new KeyedLock();
		const log: string[] = [];
		let release: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});

		const blocked = lock.run("deal-1", async () => {
			await gate;
			log.push("deal-1");
		});
		await lock.run("deal-2", async () => {
			log.push("deal-2");
		});

		expect(log).toEqual(["deal-2"]);
		release();
		await blocked;
		expect(log).toEqual(["deal-2", "deal-1"]);
	});

	it("keeps going after a failed task and forgets idle keys", async () => {
		const lock = new KeyedLock();
		const failing = lock.run("deal-1", async () => {
			throw new Error("boom");
		});
		const next = lock.run("deal-1", async () => "ok");

		await expect(failing).rejects.toThrow("boom");
		await expect(next).resolves.toBe("ok");
		expect(lock.size()).toBe(0);
	});
});
