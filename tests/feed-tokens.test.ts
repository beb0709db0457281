import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	hashFeedToken,
	issueFeedToken,
	resolveFeedToken,
	revokeFeedToken,
} from "~/lib/calendar/feed-tokens.server";
import { createWorld, type World } from "./helpers/world";

let world: World;

describe("calendar feed tokens", () => {
	beforeEach(async () => {
		world = await createWorld();
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("stores only the hash of an issued token", async () => {
		const token = await issueFeedToken(world.db, world.users.member.id);

		expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
		expect(world.db.feedTokens).toHaveLength(1);
		expect(world.db.feedTokens[0].tokenHash).toBe(hashFeedToken(token));
		expect(world.db.feedTokens[0].tokenHash).not.toContain(token);
	});

	it("resolves a token with or without the .ics suffix", async () => {
		const token = await issueFeedToken(world.db, world.users.member.id);

		expect((await resolveFeedToken(world.db, token))?.id).toBe(world.users.member.id);
		expect((await resolveFeedToken(world.db, `${token}.ics`))?.id).toBe(
			world.users.member.id,
		);
	});

	it("invalidates the previous token when a new one is issued", async () => {
		const first = await issueFeedToken(world.db, world.users.member.id);
		const second = await issueFeedToken(world.db, world.users.member.id);

		expect(await resolveFeedToken(world.db, first)).toBeNull();
		expect((await resolveFeedToken(world.db, second))?.id).toBe(world.users.member.id);
		expect(world.db.feedTokens).toHaveLength(1);
	});

	it("rejects malformed, unknown and revoked tokens", async () => {
		const token = await issueFeedToken(world.db, world.users.member.id);

		expect(await resolveFeedToken(world.db, "not-a-token")).toBeNull();
		expect(await resolveFeedToken(world.db, "A".repeat(43))).toBeNull();

		expect(await revokeFeedToken(world.db, world.users.member.id)).toBe(true);
		expect(await resolveFeedToken(world.db, token)).toBeNull();
		expect(await revokeFeedToken(world.db, world.users.member.id)).toBe(false);
	});

	it("rejects the token of a deactivated user", async () => {
		const token = await issueFeedToken(world.db, world.users.member.id);
		await world.db.updateUser(world.users.member.id, { isActive: false });

		expect(await resolveFeedToken(world.db, token)).toBeNull();
	});
});
