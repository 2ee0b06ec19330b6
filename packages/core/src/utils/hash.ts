import { createHash, createHmac } from "node:crypto";
import stringify from "safe-stable-stringify";

const deterministicStringify = stringify.configure({ deterministic: true });

/** Compute SHA-256 hash, using HMAC when a secret is provided. */
function hashPayload(payload: string, secret?: string | null): string {
	if (secret) {
		return createHmac("sha256", secret).update(payload).digest("hex");
	}
	return createHash("sha256").update(payload).digest("hex");
}

/**
 * Hash a record's content.
 *
 * With `secret`, HMAC-SHA256 is used, so someone with write access to the
 * store cannot produce a matching hash for altered content without the key.
 *
 * Keys are serialized in sorted order so the hash survives a JSONB round-trip.
 */
export function computeHash(data: Record<string, unknown>, secret?: string | null): string {
	const payload = deterministicStringify(structuredClone(data)) ?? "";
	return hashPayload(payload, secret);
}

/** Recompute and compare. */
export function verifyHash(
	data: Record<string, unknown>,
	expected: string,
	secret?: string | null,
): boolean {
	return computeHash(data, secret) === expected;
}
