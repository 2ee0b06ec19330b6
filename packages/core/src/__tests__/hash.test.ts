import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { computeHash, verifyHash } from "../utils/hash.js";

describe("computeHash", () => {
	it("produces deterministic output", () => {
		const data = { action: "TXN", entityId: "account-000001", details: { amount: 100 } };
		expect(computeHash(data)).toBe(computeHash(data));
	});

	it("returns a 64-character hex string (SHA-256)", () => {
		const hash = computeHash({ action: "CREATE" });
		expect(hash).toMatch(/^[0-9a-f]{64}$/);
	});

	it("hashes the sorted-key JSON of the data", () => {
		const expected = createHash("sha256").update('{"a":1,"b":"x"}').digest("hex");
		expect(computeHash({ b: "x", a: 1 })).toBe(expected);
	});

	it("ignores key ordering in nested objects", () => {
		const hash1 = computeHash({ action: "TXN", details: { type: "FEE", amount: 5 } });
		const hash2 = computeHash({ details: { amount: 5, type: "FEE" }, action: "TXN" });
		expect(hash1).toBe(hash2);
	});

	it("changes when any value changes", () => {
		const hash1 = computeHash({ action: "TXN", details: { amount: 100 } });
		const hash2 = computeHash({ action: "TXN", details: { amount: 101 } });
		expect(hash1).not.toBe(hash2);
	});

	it("uses HMAC when a secret is provided", () => {
		const data = { action: "CLOSE" };
		const plain = computeHash(data);
		const keyed = computeHash(data, "test-secret");
		const otherKey = computeHash(data, "other-secret");
		expect(keyed).not.toBe(plain);
		expect(keyed).not.toBe(otherKey);
	});

	it("treats a null secret like no secret", () => {
		const data = { action: "FREEZE" };
		expect(computeHash(data, null)).toBe(computeHash(data));
	});
});

describe("verifyHash", () => {
	it("accepts the hash of unchanged data", () => {
		const data = { action: "PAYMENT", details: { amount: 500 } };
		const hash = computeHash(data, "test-secret");
		expect(verifyHash(data, hash, "test-secret")).toBe(true);
	});

	it("rejects altered data", () => {
		const hash = computeHash({ action: "PAYMENT", details: { amount: 500 } });
		expect(verifyHash({ action: "PAYMENT", details: { amount: 5 } }, hash)).toBe(false);
	});

	it("rejects a hash made with a different secret", () => {
		const data = { action: "PAYMENT" };
		const hash = computeHash(data, "test-secret");
		expect(verifyHash(data, hash, "other-secret")).toBe(false);
	});
});
