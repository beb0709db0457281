import { describe, expect, it } from "vitest";
import type { CalendarEvent } from "~/lib/calendar/events";
import {
	buildIcsResponse,
	escapeIcsText,
	formatIcsDate,
	renderCalendar,
} from "~/lib/calendar/ics";

const session: CalendarEvent = {
	type: "council_session",
	model: "session",
	pk: "s-1",
	date: new Date("2030-01-20T10:00:00Z"),
	title: "Budget, 2030; draft",
	url: "/sessions/s-1",
	icsExportUrl: "/sessions/s-1/export.ics",
	badgeLabel: "Council",
	subtitle: "Northside Council",
	location: "",
	cancelled: false,
};

const cancelledMeeting: CalendarEvent = {
	type: "group_meeting",
	model: "groupmeeting",
	pk: "gm-1",
	date: new Date("2030-01-22T17:30:00Z"),
	title: "Weekly meeting",
	url: "/group-meetings/gm-1",
	icsExportUrl: "/group-meetings/gm-1/export.ics",
	badgeLabel: "Group meeting",
	subtitle: "Green Group",
	location: "Room 2\nSecond floor",
	cancelled: true,
};

const stamp = new Date("2030-01-01T08:30:00Z");

function unescapeIcsText(value: string): string {
	return value.replace(/\\([\\,;n])/g, (_, char: string) =>
		char === "n" ? "\n" : char,
	);
}

describe("ICS serializer", () => {
	it("formats UTC timestamps", () => {
		expect(formatIcsDate(new Date("2030-07-04T09:05:03.250Z"))).toBe(
			"20300704T090503Z",
		);
	});

	it("escapes backslashes, commas, semicolons and newlines", () => {
		expect(escapeIcsText("a\\b")).toBe("a\\\\b");
		expect(escapeIcsText("one, two; three")).toBe("one\\, two\\; three");
		expect(escapeIcsText("line1\r\nline2\nline3")).toBe("line1\\nline2\\nline3");
		expect(escapeIcsText("")).toBe("");
	});

	it("never lets a bare carriage return break a content line", () => {
		expect(escapeIcsText("a\rb")).toBe("a\\nb");
		expect(escapeIcsText("a\r\rb")).toBe("a\\n\\nb");
	});

	it("unescapes back to the original text", () => {
		const original = "Agenda: a\\b, c; d\ne";
		expect(unescapeIcsText(escapeIcsText(original))).toBe(original);
	});

	it("renders a confirmed event with CRLF line endings", () => {
		const body = renderCalendar([session], {
			host: "portal.example.test",
			now: stamp,
		});

		expect(body).toBe(
			[
				"BEGIN:VCALENDAR",
				"VERSION:2.0",
				"PRODID:-//Council Portal//Personal Calendar//EN",
				"CALSCALE:GREGORIAN",
				"METHOD:PUBLISH",
				"BEGIN:VEVENT",
				"UID:session-s-1@portal.example.test",
				"DTSTART:20300120T100000Z",
				"DTEND:20300120T110000Z",
				"SUMMARY:Budget\\, 2030\\; draft",
				"DESCRIPTION:Northside Council",
				"DTSTAMP:20300101T083000Z",
				"STATUS:CONFIRMED",
				"END:VEVENT",
				"END:VCALENDAR",
				"",
			].join("\r\n"),
		);
	});

	it("marks cancelled events and makes URLs absolute when given a base", () => {
		const body = renderCalendar([cancelledMeeting], {
			host: "portal.example.test",
			baseUrl: "https://portal.example.test",
			now: stamp,
			productId: "-//Test//Calendar//EN",
		});
		const lines = body.split("\r\n");

		expect(lines).toContain("PRODID:-//Test//Calendar//EN");
		expect(lines).toContain("UID:groupmeeting-gm-1@portal.example.test");
		expect(lines).toContain("LOCATION:Room 2\\nSecond floor");
		expect(lines).toContain("URL:https://portal.example.test/group-meetings/gm-1");
		expect(lines.slice(-6)).toEqual([
			"DTSTAMP:20300101T083000Z",
			"STATUS:CANCELLED",
			"SEQUENCE:1",
			"END:VEVENT",
			"END:VCALENDAR",
			"",
		]);
		expect(lines.filter((line) => line.startsWith("SEQUENCE:"))).toEqual([
			"SEQUENCE:1",
		]);
	});

	it("leaves out URL lines without a base", () => {
		const body = renderCalendar([cancelledMeeting], {
			host: "portal.example.test",
			now: stamp,
		});
		expect(body.split("\r\n").some((line) => line.startsWith("URL:"))).toBe(false);
	});

	it("renders an empty calendar for no events", () => {
		const body = renderCalendar([], { host: "h", now: stamp });
		expect(body.split("\r\n")).toEqual([
			"BEGIN:VCALENDAR",
			"VERSION:2.0",
			"PRODID:-//Council Portal//Personal Calendar//EN",
			"CALSCALE:GREGORIAN",
			"METHOD:PUBLISH",
			"END:VCALENDAR",
			"",
		]);
	});

	it("differs between renders only in DTSTAMP", () => {
		const options = { host: "portal.example.test" };
		const first = renderCalendar([session, cancelledMeeting], {
			...options,
			now: stamp,
		});
		const second = renderCalendar([session, cancelledMeeting], {
			...options,
			now: new Date("2031-06-01T00:00:00Z"),
		});
		const withoutStamp = (body: string) =>
			body
				.split("\r\n")
				.filter((line) => !line.startsWith("DTSTAMP:"));

		expect(first).not.toBe(second);
		expect(withoutStamp(second)).toEqual(withoutStamp(first));
	});

	it("sets calendar headers for downloads and feeds", () => {
		const download = buildIcsResponse("BODY", {
			type: "attachment",
			filename: "personal-calendar.ics",
		});
		const feed = buildIcsResponse("BODY", { type: "inline" });

		expect(download.headers.get("Content-Type")).toBe("text/calendar; charset=utf-8");
		expect(download.headers.get("Content-Disposition")).toBe(
			'attachment; filename="personal-calendar.ics"',
		);
		expect(feed.headers.get("Content-Disposition")).toBe("inline");
	});
});
