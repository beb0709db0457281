import { beforeEach, describe, expect, it } from "vitest";
import { aggregateCalendar } from "~/lib/calendar/aggregate.server";
import type { CalendarEvent } from "~/lib/calendar/events";
import type { User } from "~/db";
import { accessContext, createWorld, type World } from "./helpers/world";

const now = new Date("2030-01-15T12:00:00Z");
const t = (key: string) => `t:${key}`;

let world: World;

async function calendarFor(
	user: User,
	includeRecentPast: boolean,
): Promise<CalendarEvent[]> {
	const context = await accessContext(world, user);
	return aggregateCalendar(world.db, context.user, context.memberships, {
		includeRecentPast,
		t,
		now,
	});
}

const titles = (events: CalendarEvent[]) => events.map((event) => event.title);

describe("calendar aggregation", () => {
	beforeEach(async () => {
		world = await createWorld();
		const { db, councils, groups, committees, users } = world;

		await db.createSession({
			title: "Budget session",
			councilId: councils.north.id,
			scheduledDate: new Date("2030-01-20T10:00:00Z"),
			location: "Town Hall",
		});
		await db.createSession({
			title: "Last week's session",
			councilId: councils.north.id,
			scheduledDate: new Date("2030-01-10T10:00:00Z"),
		});
		await db.createSession({
			title: "Committee-bound session",
			councilId: councils.north.id,
			committeeId: committees.finance.id,
			scheduledDate: new Date("2030-01-21T10:00:00Z"),
		});
		await db.createSession({
			title: "Inactive session",
			councilId: councils.north.id,
			scheduledDate: new Date("2030-01-23T10:00:00Z"),
			isActive: false,
		});
		await db.createSession({
			title: "Southside session",
			councilId: councils.south.id,
			scheduledDate: new Date("2030-01-24T10:00:00Z"),
		});
		const excused = await db.createSession({
			title: "Excused session",
			councilId: councils.north.id,
			scheduledDate: new Date("2030-01-25T10:00:00Z"),
		});
		await db.createSessionExcuse(excused.id, users.member.id);

		await db.createGroupMeeting({
			title: "Weekly group meeting",
			groupId: groups.green.id,
			scheduledDate: new Date("2030-01-18T17:00:00Z"),
		});
		await db.createGroupMeeting({
			title: "Called-off meeting",
			groupId: groups.green.id,
			scheduledDate: new Date("2030-01-22T17:00:00Z"),
			status: "cancelled",
			isActive: false,
		});
		await db.createGroupMeeting({
			title: "Blue meeting",
			groupId: groups.blue.id,
			scheduledDate: new Date("2030-01-19T17:00:00Z"),
		});

		await db.addCommitteeMember(committees.finance.id, users.member.id);
		await db.createCommitteeMeeting({
			title: "Finance meeting",
			committeeId: committees.finance.id,
			scheduledDate: new Date("2030-01-16T09:00:00Z"),
		});
	});

	it("collects upcoming sessions, committee and group meetings in date order", async () => {
		const events = await calendarFor(world.users.member, false);

		expect(titles(events)).toEqual([
			"Finance meeting",
			"Weekly group meeting",
			"Budget session",
		]);
	});

	it("reaches back and keeps cancelled group meetings in subscription mode", async () => {
		const events = await calendarFor(world.users.member, true);

		expect(titles(events)).toEqual([
			"Last week's session",
			"Finance meeting",
			"Weekly group meeting",
			"Budget session",
			"Called-off meeting",
		]);
		const cancelled = events[4];
		expect(cancelled.type).toBe("group_meeting");
		expect(cancelled.cancelled).toBe(true);
	});

	it("keeps an active session marked cancelled and flags it", async () => {
		await world.db.createSession({
			title: "Cancelled session",
			councilId: world.councils.north.id,
			scheduledDate: new Date("2030-01-26T10:00:00Z"),
			status: "cancelled",
		});

		for (const mode of [false, true]) {
			const events = await calendarFor(world.users.member, mode);
			const session = events.find((event) => event.title === "Cancelled session");
			expect(session).toMatchObject({
				type: "council_session",
				cancelled: true,
			});
		}
	});

	it("never includes sessions the user excused themselves from", async () => {
		for (const mode of [false, true]) {
			const events = await calendarFor(world.users.member, mode);
			expect(titles(events)).not.toContain("Excused session");
		}
	});

	it("fills each event from its source row", async () => {
		const [meeting, groupMeeting, session] = await calendarFor(
			world.users.member,
			false,
		);

		expect(session).toMatchObject({
			type: "council_session",
			model: "session",
			url: `/sessions/${session.pk}`,
			icsExportUrl: `/sessions/${session.pk}/export.ics`,
			badgeLabel: "t:calendar.badge.council",
			subtitle: "Northside Council",
			location: "Town Hall",
			cancelled: false,
		});
		expect(meeting).toMatchObject({
			type: "committee_meeting",
			model: "committeemeeting",
			badgeLabel: "t:calendar.committeeType.committee",
			subtitle: "Finance",
			cancelled: false,
		});
		expect(groupMeeting).toMatchObject({
			type: "group_meeting",
			badgeLabel: "t:calendar.badge.groupMeeting",
			subtitle: "Green Group",
			url: `/group-meetings/${groupMeeting.pk}`,
		});
	});

	it("prefers a configured badge name over the default term", async () => {
		await world.db.updateCouncil(world.councils.north.id, {
			calendarBadgeName: "  Town council  ",
		});
		await world.db.updateGroup(world.groups.green.id, { calendarBadgeName: "   " });

		const events = await calendarFor(world.users.member, false);

		expect(events.map((event) => event.badgeLabel)).toEqual([
			"t:calendar.committeeType.committee",
			"t:calendar.badge.groupMeeting",
			"Town council",
		]);
	});

	it("returns nothing for a user without memberships", async () => {
		expect(await calendarFor(world.users.loner, true)).toEqual([]);
	});

	it("shows a substitute the meeting they attend, never as cancelled", async () => {
		const { loner, outsider } = world.users;
		const { planning } = world.committees;
		const regular = await world.db.addCommitteeMember(planning.id, outsider.id);
		const substitute = await world.db.addCommitteeMember(
			planning.id,
			loner.id,
			"substitute_member",
		);
		const attended = await world.db.createCommitteeMeeting({
			title: "Zoning hearing",
			committeeId: planning.id,
			scheduledDate: new Date("2030-02-01T09:00:00Z"),
		});
		await world.db.createCommitteeMeeting({
			title: "Another hearing",
			committeeId: planning.id,
			scheduledDate: new Date("2030-02-08T09:00:00Z"),
		});
		await world.db.addSubstitute(attended.id, regular.id, substitute.id);

		const events = await calendarFor(loner, false);

		expect(events).toHaveLength(1);
		expect(events[0]).toMatchObject({
			type: "committee_meeting",
			title: "Zoning hearing",
			badgeLabel: "t:calendar.committeeType.commission",
			cancelled: false,
		});
	});

	it("gives superusers the sessions of every active council", async () => {
		const events = await calendarFor(world.users.superuser, false);

		expect(titles(events)).toEqual([
			"Budget session",
			"Southside session",
			"Excused session",
		]);
	});

	it("produces the same events for the same state", async () => {
		const first = await calendarFor(world.users.member, true);
		const second = await calendarFor(world.users.member, true);
		expect(second).toEqual(first);
	});
});
