import { getTranslator } from "~/i18next.server";
import { requireUser } from "~/lib/auth.server";
import { aggregateCalendar } from "~/lib/calendar/aggregate.server";
import { calendarHost } from "~/lib/calendar/event-export.server";
import { buildIcsResponse, renderCalendar } from "~/lib/calendar/ics";
import { CALENDAR_CONFIG } from "~/lib/config.server";
import type { RouteHandler } from "~/lib/router.server";

/**
 * One-off download of the signed-in user's upcoming events
 */
export const loader: RouteHandler = async ({ request }) => {
	const { db, user, memberships } = await requireUser(request);
	const t = await getTranslator(user.language);

	const events = await aggregateCalendar(db, user, memberships, {
		includeRecentPast: false,
		t,
	});

	const body = renderCalendar(events, {
		host: calendarHost(request),
		productId: CALENDAR_CONFIG.productId,
	});
	return buildIcsResponse(body, {
		type: "attachment",
		filename: "personal-calendar.ics",
	});
};
