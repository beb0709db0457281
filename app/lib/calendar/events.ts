import type {
	CommitteeMeetingRow,
	CouncilSessionRow,
	GroupMeetingRow,
} from "~/db/adapters/types";
import type { Translate } from "~/i18next.server";
import { type CalendarModel, entityPath, icsExportPath } from "~/lib/urls";

export type CalendarEventType =
	| "council_session"
	| "committee_meeting"
	| "group_meeting";

interface CalendarEventBase {
	type: CalendarEventType;
	model: CalendarModel;
	pk: string;
	date: Date;
	title: string;
	url: string;
	icsExportUrl: string;
	badgeLabel: string;
	subtitle: string;
	location: string;
	cancelled: boolean;
}

/**
 * One entry of a personal calendar. `(model, pk)` identifies the source row
 * and stays stable across renders.
 */
export type CalendarEvent =
	| (CalendarEventBase & { type: "council_session"; model: "session" })
	| (CalendarEventBase & {
			type: "committee_meeting";
			model: "committeemeeting";
			cancelled: false;
	  })
	| (CalendarEventBase & { type: "group_meeting"; model: "groupmeeting" });

export function councilSessionEvent(
	{ session, council }: CouncilSessionRow,
	t: Translate,
): CalendarEvent {
	return {
		type: "council_session",
		model: "session",
		pk: session.id,
		date: session.scheduledDate,
		title: session.title,
		url: entityPath("session", session.id),
		icsExportUrl: icsExportPath("session", session.id),
		badgeLabel: council.calendarBadgeName.trim() || t("calendar.badge.council"),
		subtitle: council.name,
		location: session.location,
		cancelled: session.status === "cancelled",
	};
}

export function committeeMeetingEvent(
	{ meeting, committee }: CommitteeMeetingRow,
	t: Translate,
): CalendarEvent {
	return {
		type: "committee_meeting",
		model: "committeemeeting",
		pk: meeting.id,
		date: meeting.scheduledDate,
		title: meeting.title,
		url: entityPath("committeemeeting", meeting.id),
		icsExportUrl: icsExportPath("committeemeeting", meeting.id),
		badgeLabel: t(`calendar.committeeType.${committee.committeeType}`),
		subtitle: committee.name,
		location: meeting.location,
		cancelled: false,
	};
}

export function groupMeetingEvent(
	{ meeting, group }: GroupMeetingRow,
	t: Translate,
): CalendarEvent {
	return {
		type: "group_meeting",
		model: "groupmeeting",
		pk: meeting.id,
		date: meeting.scheduledDate,
		title: meeting.title,
		url: entityPath("groupmeeting", meeting.id),
		icsExportUrl: icsExportPath("groupmeeting", meeting.id),
		badgeLabel:
			group.calendarBadgeName.trim() || t("calendar.badge.groupMeeting"),
		subtitle: group.name,
		location: meeting.location,
		cancelled: meeting.status === "cancelled",
	};
}

/** Ascending by date; events on the same instant keep their order */
export function sortByDate(events: CalendarEvent[]): CalendarEvent[] {
	return [...events].sort((a, b) => a.date.getTime() - b.date.getTime());
}
