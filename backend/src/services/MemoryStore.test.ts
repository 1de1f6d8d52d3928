import { MemoryStore } from "./MemoryStore";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("MemoryStore", () => {
	let clock: number;
	let store: MemoryStore;

	beforeEach(() => {
		clock = 1_000_000;
		store = new MemoryStore(() => clock);
	});

	afterEach(async () => {
		await store.close();
	});

	it("returns null for missing keys", async () => {
		expect(await store.get("missing")).toBeNull();
	});

	it("overwrites values", async () => {
		await store.set("greeting", "hello");
		await store.set("greeting", "hi");

		expect(await store.get("greeting")).toBe("hi");
	});

	it("expires values after their TTL", async () => {
		await store.set("session", "abc", 30);

		clock += 29_999;
		expect(await store.get("session")).toBe("abc");
		clock += 1;
		expect(await store.get("session")).toBeNull();
	});

	it("keeps values without a TTL", async () => {
		await store.set("forever", "yes");
		clock += 365 * 24 * 3600 * 1000;

		expect(await store.get("forever")).toBe("yes");
	});

	it("counts only keys it deleted", async () => {
		await store.set("a", "1");
		await store.set("b", "2");

		expect(await store.del("a", "b", "c")).toBe(2);
		expect(await store.get("a")).toBeNull();
	});

	it("matches keys by prefix or exactly", async () => {
		await store.set("tenant:t1:cart", "x");
		await store.set("tenant:t1:wishlist", "y", 1);
		await store.set("tenant:t2:cart", "z");
		clock += 1000;

		expect(await store.keys("tenant:t1:*")).toEqual(["tenant:t1:cart"]);
		expect(await store.keys("tenant:t2:cart")).toEqual(["tenant:t2:cart"]);
		expect(await store.keys("tenant:t2")).toEqual([]);
	});

	it("answers ping", async () => {
		expect(await store.ping()).toBe("PONG");
	});

	it("forgets everything on close", async () => {
		await store.set("a", "1");
		await store.close();

		expect(await store.get("a")).toBeNull();
	});
});
