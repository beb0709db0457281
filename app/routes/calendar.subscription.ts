import { z } from "zod";
import { requireUser } from "~/lib/auth.server";
import {
	issueFeedToken,
	revokeFeedToken,
} from "~/lib/calendar/feed-tokens.server";
import { formFields, parseFields } from "~/lib/entity-schemas";
import { requestOrigin } from "~/lib/http.server";
import type { RouteHandler } from "~/lib/router.server";
import { calendarFeedPath } from "~/lib/urls";

const subscriptionSchema = z.object({
	intent: z.enum(["issue", "revoke"]).default("issue"),
});

/**
 * Issue a new feed URL (the previous one stops working) or revoke it.
 * The raw token appears in this reply and nowhere else.
 */
export const action: RouteHandler = async ({ request }) => {
	const { db, user } = await requireUser(request);
	const { intent } = parseFields(
		subscriptionSchema,
		formFields(await request.formData()),
	);

	if (intent === "revoke") {
		const revoked = await revokeFeedToken(db, user.id);
		return Response.json({ revoked });
	}

	const token = await issueFeedToken(db, user.id);
	const feedUrl = new URL(
		calendarFeedPath(token),
		requestOrigin(request).origin,
	).toString();
	return Response.json({ feedUrl });
};
