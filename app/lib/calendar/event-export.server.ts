import type { DatabaseAdapter } from "~/db";
import { getTranslator, type Translate } from "~/i18next.server";
import type { AccessTarget } from "~/lib/access/types";
import { requireAccess, requireUser } from "~/lib/auth.server";
import { CALENDAR_CONFIG } from "~/lib/config.server";
import { badRequest, notFound, requestOrigin } from "~/lib/http.server";
import type { RouteHandler } from "~/lib/router.server";
import { type CalendarModel, ENTITY_SEGMENTS } from "~/lib/urls";
import {
	type CalendarEvent,
	committeeMeetingEvent,
	councilSessionEvent,
	groupMeetingEvent,
} from "./events";
import { buildIcsResponse, renderCalendar } from "./ics";

interface ExportableEvent {
	event: CalendarEvent;
	target: AccessTarget;
}

type EventLoader = (
	db: DatabaseAdapter,
	id: string,
	t: Translate,
) => Promise<ExportableEvent | null>;

const EVENT_LOADERS: Record<CalendarModel, EventLoader> = {
	session: async (db, id, t) => {
		const session = await db.getSessionById(id);
		if (!session) return null;
		const council = await db.getCouncilById(session.councilId);
		if (!council) return null;
		return {
			event: councilSessionEvent({ session, council }, t),
			target: {
				type: "session",
				id: session.id,
				councilId: session.councilId,
				committeeId: session.committeeId,
			},
		};
	},
	committeemeeting: async (db, id, t) => {
		const meeting = await db.getCommitteeMeetingById(id);
		if (!meeting) return null;
		const committee = await db.getCommitteeById(meeting.committeeId);
		if (!committee) return null;
		return {
			event: committeeMeetingEvent({ meeting, committee }, t),
			target: {
				type: "committeemeeting",
				id: meeting.id,
				committeeId: meeting.committeeId,
				councilId: meeting.councilId,
			},
		};
	},
	groupmeeting: async (db, id, t) => {
		const meeting = await db.getGroupMeetingById(id);
		if (!meeting) return null;
		const group = await db.getGroupById(meeting.groupId);
		if (!group) return null;
		return {
			event: groupMeetingEvent({ meeting, group }, t),
			target: { type: "groupmeeting", id: meeting.id, groupId: meeting.groupId },
		};
	},
};

/** UID host: the host the client used, or the configured fallback */
export function calendarHost(request: Request): string {
	return requestOrigin(request).host || CALENDAR_CONFIG.fallbackHost;
}

/**
 * Loader for the single-event download of a session or meeting
 */
export function createEventExportLoader(
	model: CalendarModel,
	idParam: string,
): RouteHandler {
	const loadEvent = EVENT_LOADERS[model];
	return async ({ request, params }) => {
		const context = await requireUser(request);
		const eventId = params[idParam];
		if (!eventId) {
			throw badRequest(`${model} ID required`);
		}

		const t = await getTranslator(context.user.language);
		const exportable = await loadEvent(context.db, eventId, t);
		if (!exportable) {
			throw notFound();
		}
		requireAccess(context, "view", exportable.target);

		const body = renderCalendar([exportable.event], {
			host: calendarHost(request),
			baseUrl: requestOrigin(request).origin,
			productId: CALENDAR_CONFIG.productId,
		});
		return buildIcsResponse(body, {
			type: "attachment",
			filename: `${ENTITY_SEGMENTS[model]}-${eventId}.ics`,
		});
	};
}
