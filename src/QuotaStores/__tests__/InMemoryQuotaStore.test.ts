import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { InMemoryQuotaStore } from "../InMemoryQuotaStore";

describe("InMemoryQuotaStore", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(0);
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("allows the rate amount of hits and then denies until the window ends", async () => {
		const store = new InMemoryQuotaStore();
		const quota = { rate: 2, burst: 2, periodMs: 1000 };

		expect(await store.consume("key", quota)).toEqual({
			allowed: true,
			remaining: 1,
			retryAfterMs: -1,
			resetAfterMs: 1000,
		});
		expect(await store.consume("key", quota)).toEqual({
			allowed: true,
			remaining: 0,
			retryAfterMs: -1,
			resetAfterMs: 1000,
		});
		expect(await store.consume("key", quota)).toEqual({
			allowed: false,
			remaining: 0,
			retryAfterMs: 1000,
			resetAfterMs: 1000,
		});
	});

	it("allows again once the window has ended", async () => {
		const store = new InMemoryQuotaStore();
		const quota = { rate: 2, burst: 2, periodMs: 1000 };

		await store.consume("key", quota);
		await store.consume("key", quota);

		vi.advanceTimersByTime(999);
		expect(await store.consume("key", quota)).toEqual({
			allowed: false,
			remaining: 0,
			retryAfterMs: 1,
			resetAfterMs: 1,
		});

		vi.advanceTimersByTime(1);
		expect(await store.consume("key", quota)).toEqual({
			allowed: true,
			remaining: 1,
			retryAfterMs: -1,
			resetAfterMs: 1000,
		});
	});

	it("starts the window with the first hit", async () => {
		const store = new InMemoryQuotaStore();
		const quota = { rate: 2, burst: 2, periodMs: 1000 };

		vi.advanceTimersByTime(300);
		await store.consume("key", quota);
		vi.advanceTimersByTime(700);
		expect((await store.consume("key", quota)).allowed).toBe(true);
		expect((await store.consume("key", quota)).retryAfterMs).toBe(300);
	});

	it("doesn't count denied hits", async () => {
		const store = new InMemoryQuotaStore();
		const quota = { rate: 1, burst: 1, periodMs: 1000 };

		expect((await store.consume("key", quota)).allowed).toBe(true);
		for (let i = 0; i < 3; i++) {
			const result = await store.consume("key", quota);
			expect(result.allowed).toBe(false);
			expect(result.retryAfterMs).toBe(1000);
		}
		vi.advanceTimersByTime(1000);
		expect((await store.consume("key", quota)).allowed).toBe(true);
	});

	it("treats separate keys separately", async () => {
		const store = new InMemoryQuotaStore();
		const quota = { rate: 1, burst: 1, periodMs: 1000 };

		expect((await store.consume("key1", quota)).allowed).toBe(true);
		expect((await store.consume("key1", quota)).allowed).toBe(false);
		expect((await store.consume("key2", quota)).allowed).toBe(true);
	});

	it("removes expired windows on consume without manual calls", async () => {
		const store = new InMemoryQuotaStore();
		const quota = { rate: 1, burst: 1, periodMs: 1000 };

		for (let i = 0; i < 1000; i++) {
			await store.consume(`key${i}`, quota);
		}
		expect(store.size).toBe(1000);

		vi.advanceTimersByTime(10_000);
		await store.consume("fresh", quota);
		expect(store.size).toBe(1);
	});

	it("removes expired windows at most once per sweep interval", async () => {
		const store = new InMemoryQuotaStore({ sweepIntervalMs: 5000 });

		await store.consume("short", { rate: 1, burst: 1, periodMs: 1000 });
		vi.advanceTimersByTime(1000);
		await store.consume("other", { rate: 1, burst: 1, periodMs: 1000 });
		expect(store.size).toBe(2);

		vi.advanceTimersByTime(4000);
		await store.consume("other", { rate: 1, burst: 1, periodMs: 1000 });
		expect(store.size).toBe(1);
	});

	it("allows to remove expired windows and all state manually", async () => {
		const store = new InMemoryQuotaStore();

		await store.consume("short", { rate: 1, burst: 1, periodMs: 1000 });
		await store.consume("long", { rate: 1, burst: 1, periodMs: 5000 });
		expect(store.size).toBe(2);

		vi.advanceTimersByTime(1000);
		store.checkExpiration();
		expect(store.size).toBe(1);

		store.clear();
		expect(store.size).toBe(0);
	});

	it("rejects invalid options", () => {
		expect(() => new InMemoryQuotaStore({ sweepIntervalMs: 0 })).toThrow(ZodError);
	});
});
