import { createHash, randomBytes } from "node:crypto";
import { z } from "zod";
import type { DatabaseAdapter, User } from "~/db";

/** 32 random bytes, base64url without padding */
const tokenSchema = z.string().regex(/^[A-Za-z0-9_-]{43}$/);

export function hashFeedToken(token: string): string {
	return createHash("sha256").update(token).digest("hex");
}

/**
 * Issue a fresh subscription token for the user. Only its hash is stored,
 * so the raw value is returned exactly once and any previous token stops working.
 */
export async function issueFeedToken(
	db: DatabaseAdapter,
	userId: string,
): Promise<string> {
	const token = randomBytes(32).toString("base64url");
	await db.replaceCalendarFeedToken(userId, hashFeedToken(token));
	console.log(`[Calendar] Issued feed token for user ${userId}`);
	return token;
}

export async function revokeFeedToken(
	db: DatabaseAdapter,
	userId: string,
): Promise<boolean> {
	const removed = await db.deleteCalendarFeedToken(userId);
	if (removed) {
		console.log(`[Calendar] Revoked feed token for user ${userId}`);
	}
	return removed;
}

/**
 * Look up the active user a raw feed token belongs to.
 * Malformed, unknown and revoked tokens all resolve to null.
 */
export async function resolveFeedToken(
	db: DatabaseAdapter,
	rawToken: string,
): Promise<User | null> {
	const token = rawToken.endsWith(".ics") ? rawToken.slice(0, -4) : rawToken;
	const parsed = tokenSchema.safeParse(token);
	if (!parsed.success) return null;

	const record = await db.findCalendarFeedTokenByHash(
		hashFeedToken(parsed.data),
	);
	if (!record) return null;

	const user = await db.findUserById(record.userId);
	if (!user?.isActive) return null;
	return user;
}
