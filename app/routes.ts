import type { EntityType } from "~/db/types";
import {
	createGenericDeleteAction,
	createGenericDeleteLoader,
} from "~/lib/actions/generic-delete.server";
import type { RouteObject } from "react-router";
import { resourceRoute } from "~/lib/router.server";
import { ENTITY_SEGMENTS } from "~/lib/urls";
import {
	createEditHandlers,
	createListLoader,
	createNewHandlers,
	createViewLoader,
} from "~/lib/view-handlers.server";
import * as authLogout from "./routes/auth.logout";
import * as calendarExport from "./routes/calendar.export";
import * as calendarFeed from "./routes/calendar.feed.$token";
import * as calendarSubscription from "./routes/calendar.subscription";
import * as committeeMeetingExport from "./routes/committee-meetings.$meetingId.export";
import * as groupMeetingExport from "./routes/group-meetings.$meetingId.export";
import * as groupMemberAdmin from "./routes/group-members.$memberId.admin";
import * as groupMemberRoles from "./routes/group-members.$memberId.roles";
import * as home from "./routes/home";
import * as motionComments from "./routes/motions.$motionId.comments";
import * as motionVote from "./routes/motions.$motionId.vote";
import * as sessionExcuse from "./routes/sessions.$sessionId.excuse";
import * as sessionExport from "./routes/sessions.$sessionId.export";

/**
 * List, create, detail, edit and delete pages of one entity type
 */
function entityRoutes(type: EntityType, idParam: string): RouteObject[] {
	const base = ENTITY_SEGMENTS[type];
	const item = `${base}/:${idParam}`;
	return [
		resourceRoute(base, { loader: createListLoader(type) }),
		resourceRoute(`${base}/new`, createNewHandlers(type)),
		resourceRoute(item, { loader: createViewLoader(type, idParam) }),
		resourceRoute(`${item}/edit`, createEditHandlers(type, idParam)),
		resourceRoute(`${item}/delete`, {
			loader: createGenericDeleteLoader(type, idParam),
			action: createGenericDeleteAction(type, idParam),
		}),
	];
}

export default [
	resourceRoute("/", home),
	resourceRoute("auth/logout", authLogout),

	// Personal calendar
	resourceRoute("calendar/export.ics", calendarExport),
	resourceRoute("calendar/feed/:token", calendarFeed),
	resourceRoute("calendar/subscription", calendarSubscription),

	// Administration
	...entityRoutes("user", "userId"),
	...entityRoutes("role", "roleId"),

	// Groups
	...entityRoutes("group", "groupId"),
	...entityRoutes("groupmember", "memberId"),
	resourceRoute("group-members/:memberId/admin", groupMemberAdmin),
	resourceRoute("group-members/:memberId/roles", groupMemberRoles),
	...entityRoutes("groupmeeting", "meetingId"),
	resourceRoute("group-meetings/:meetingId/export.ics", groupMeetingExport),
	...entityRoutes("motion", "motionId"),
	resourceRoute("motions/:motionId/vote", motionVote),
	resourceRoute("motions/:motionId/comments", motionComments),
	...entityRoutes("inquiry", "inquiryId"),

	// Locals and councils
	...entityRoutes("local", "localId"),
	...entityRoutes("council", "councilId"),
	...entityRoutes("session", "sessionId"),
	resourceRoute("sessions/:sessionId/excuse", sessionExcuse),
	resourceRoute("sessions/:sessionId/export.ics", sessionExport),
	...entityRoutes("committee", "committeeId"),
	...entityRoutes("committeemeeting", "meetingId"),
	resourceRoute("committee-meetings/:meetingId/export.ics", committeeMeetingExport),
] satisfies RouteObject[];
