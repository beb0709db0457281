import type { EntityType } from "~/db/types";

/** URL path segment of each entity type's pages */
export const ENTITY_SEGMENTS: Record<EntityType, string> = {
	user: "users",
	role: "roles",
	group: "groups",
	groupmember: "group-members",
	groupmeeting: "group-meetings",
	motion: "motions",
	inquiry: "inquiries",
	local: "locals",
	council: "councils",
	session: "sessions",
	committee: "committees",
	committeemeeting: "committee-meetings",
};

export function entityListPath(type: EntityType): string {
	return `/${ENTITY_SEGMENTS[type]}`;
}

export function entityPath(type: EntityType, id: string): string {
	return `/${ENTITY_SEGMENTS[type]}/${id}`;
}

export type CalendarModel = "session" | "committeemeeting" | "groupmeeting";

/** Single-event calendar download of a session or meeting */
export function icsExportPath(model: CalendarModel, id: string): string {
	return `${entityPath(model, id)}/export.ics`;
}

export const CALENDAR_EXPORT_PATH = "/calendar/export.ics";

export function calendarFeedPath(token: string): string {
	return `/calendar/feed/${token}.ics`;
}
