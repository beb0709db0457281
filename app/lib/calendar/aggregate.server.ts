import type { DatabaseAdapter } from "~/db";
import type { Translate } from "~/i18next.server";
import type { ResolvedMemberships } from "~/lib/access/types";
import {
	type CalendarEvent,
	committeeMeetingEvent,
	councilSessionEvent,
	groupMeetingEvent,
	sortByDate,
} from "./events";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AggregateOptions {
	/**
	 * Subscription feeds reach back `lookbackDays` and keep cancelled group
	 * meetings, so subscribed clients can pick up cancellations.
	 */
	includeRecentPast: boolean;
	t: Translate;
	now?: Date;
	lookbackDays?: number;
}

/**
 * Personal calendar of a user: council sessions of their councils, meetings
 * of their committees (or the ones they substitute in) and meetings of
 * their groups, ascending by date.
 */
export async function aggregateCalendar(
	db: DatabaseAdapter,
	user: { id: string },
	memberships: ResolvedMemberships,
	options: AggregateOptions,
): Promise<CalendarEvent[]> {
	const { includeRecentPast, t, now = new Date(), lookbackDays = 30 } = options;
	const from = includeRecentPast
		? new Date(now.getTime() - lookbackDays * DAY_MS)
		: now;

	const councilIds = memberships.councils.map((council) => council.id);
	const groupIds = memberships.groupMemberships.map(
		(record) => record.membership.groupId,
	);

	const [sessionRows, committeeRows, groupRows] = await Promise.all([
		db.getCouncilSessionsForCalendar(councilIds, from),
		db.getCommitteeMeetingsForCalendar(
			memberships.committeeIds,
			memberships.substituteMeetingIds,
			from,
		),
		db.getGroupMeetingsForCalendar(groupIds, from, includeRecentPast),
	]);

	const excused = new Set(
		await db.getExcusedSessionIds(
			user.id,
			sessionRows.map((row) => row.session.id),
		),
	);

	const events: CalendarEvent[] = [
		...sessionRows
			.filter((row) => !excused.has(row.session.id))
			.map((row) => councilSessionEvent(row, t)),
		...committeeRows.map((row) => committeeMeetingEvent(row, t)),
		...groupRows.map((row) => groupMeetingEvent(row, t)),
	];

	return sortByDate(events);
}
