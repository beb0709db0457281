import { getTranslator } from "~/i18next.server";
import { requireUser } from "~/lib/auth.server";
import { aggregateCalendar } from "~/lib/calendar/aggregate.server";
import { SITE_CONFIG } from "~/lib/config.server";
import type { RouteHandler } from "~/lib/router.server";
import { CALENDAR_EXPORT_PATH } from "~/lib/urls";

export const loader: RouteHandler = async ({ request }) => {
	const { db, user, memberships } = await requireUser(request);
	const t = await getTranslator(user.language);

	const upcomingEvents = await aggregateCalendar(db, user, memberships, {
		includeRecentPast: false,
		t,
	});

	return Response.json({
		siteConfig: SITE_CONFIG,
		user: { id: user.id, name: user.name, isSuperuser: user.isSuperuser },
		groupMemberships: memberships.groupMemberships,
		leaderGroups: memberships.leaderGroups.map((entry) => entry.group),
		adminGroups: memberships.adminGroups.map((entry) => entry.group),
		locals: memberships.locals,
		councils: memberships.councils,
		upcomingEvents,
		calendarExportUrl: CALENDAR_EXPORT_PATH,
	});
};
