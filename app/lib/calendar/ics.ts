/**
 * iCalendar (RFC 5545) output for personal calendars.
 * Used by the calendar download, the subscription feed and single-event exports.
 */

import type { CalendarEvent } from "./events";

const CRLF = "\r\n";
const EVENT_DURATION_MS = 60 * 60 * 1000;

export const DEFAULT_PRODUCT_ID = "-//Council Portal//Personal Calendar//EN";

export interface RenderCalendarOptions {
	/** Host part of every UID */
	host: string;
	/** Origin that makes event URLs absolute; without it URL lines are left out */
	baseUrl?: string;
	now?: Date;
	productId?: string;
}

/**
 * Escape free text for an iCalendar property value.
 */
export function escapeIcsText(value: string): string {
	if (!value) return "";
	return value
		.replace(/\\/g, "\\\\")
		.replace(/,/g, "\\,")
		.replace(/;/g, "\\;")
		.replace(/\r\n|\r|\n/g, "\\n");
}

/** UTC timestamp as YYYYMMDDTHHMMSSZ */
export function formatIcsDate(date: Date): string {
	return `${date.toISOString().slice(0, 19).replace(/[-:]/g, "")}Z`;
}

function eventLines(
	event: CalendarEvent,
	options: RenderCalendarOptions,
	stamp: string,
): string[] {
	const start = event.date;
	const end = new Date(start.getTime() + EVENT_DURATION_MS);
	const description = escapeIcsText(event.subtitle);
	const location = escapeIcsText(event.location);

	const lines = [
		"BEGIN:VEVENT",
		`UID:${event.model}-${event.pk}@${options.host}`,
		`DTSTART:${formatIcsDate(start)}`,
		`DTEND:${formatIcsDate(end)}`,
		`SUMMARY:${escapeIcsText(event.title)}`,
	];
	if (description) lines.push(`DESCRIPTION:${description}`);
	if (location) lines.push(`LOCATION:${location}`);
	if (options.baseUrl && event.url) {
		lines.push(`URL:${new URL(event.url, options.baseUrl).toString()}`);
	}
	lines.push(`DTSTAMP:${stamp}`);
	if (event.cancelled) {
		// Clients treat a higher sequence as an update of the UID they already hold
		lines.push("STATUS:CANCELLED", "SEQUENCE:1");
	} else {
		lines.push("STATUS:CONFIRMED");
	}
	lines.push("END:VEVENT");
	return lines;
}

/**
 * Render events as one VCALENDAR document. Every line ends in CRLF.
 */
export function renderCalendar(
	events: readonly CalendarEvent[],
	options: RenderCalendarOptions,
): string {
	const stamp = formatIcsDate(options.now ?? new Date());
	const lines = [
		"BEGIN:VCALENDAR",
		"VERSION:2.0",
		`PRODID:${options.productId ?? DEFAULT_PRODUCT_ID}`,
		"CALSCALE:GREGORIAN",
		"METHOD:PUBLISH",
	];
	for (const event of events) {
		lines.push(...eventLines(event, options, stamp));
	}
	lines.push("END:VCALENDAR");
	return lines.map((line) => `${line}${CRLF}`).join("");
}

export type IcsDisposition =
	| { type: "attachment"; filename: string }
	| { type: "inline" };

/**
 * Build a Response carrying a calendar document with the right headers.
 */
export function buildIcsResponse(
	body: string,
	disposition: IcsDisposition,
): Response {
	return new Response(body, {
		headers: {
			"Content-Type": "text/calendar; charset=utf-8",
			"Content-Disposition":
				disposition.type === "attachment"
					? `attachment; filename="${disposition.filename}"`
					: "inline",
		},
	});
}
