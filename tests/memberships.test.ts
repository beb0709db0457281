import { beforeEach, describe, expect, it } from "vitest";
import { accessContext, createWorld, joinGroup, type World } from "./helpers/world";

let world: World;

describe("membership resolver", () => {
	beforeEach(async () => {
		world = await createWorld();
	});

	it("splits leader and admin groups and merges them leader-first", async () => {
		const { leader } = world.users;
		await joinGroup(world.db, leader, world.groups.blue, ["group_admin"]);

		const { memberships } = await accessContext(world, leader);

		expect(memberships.leaderGroups.map((entry) => entry.group.name)).toEqual([
			"Green Group",
		]);
		expect(memberships.adminGroups.map((entry) => entry.group.name)).toEqual([
			"Blue Group",
		]);
		expect(memberships.allGroups.map((entry) => entry.group.name)).toEqual([
			"Green Group",
			"Blue Group",
		]);
	});

	it("lists a group held as both leader and admin once", async () => {
		const { deputy } = world.users;
		const [record] = await world.db.getActiveGroupMembershipsForUser(deputy.id);
		await world.db.addGroupMemberRole(record.membership.id, "group_admin");

		const { memberships } = await accessContext(world, deputy);

		expect(memberships.allGroups).toHaveLength(1);
		expect(memberships.allGroups[0]).toMatchObject({
			isLeader: true,
			isAdmin: true,
		});
	});

	it("gives plain members no leader or admin groups", async () => {
		const { memberships } = await accessContext(world, world.users.member);

		expect(memberships.groupMemberships).toHaveLength(1);
		expect(memberships.leaderGroups).toEqual([]);
		expect(memberships.allGroups).toEqual([]);
	});

	it("follows group, party and local to the council, without duplicates", async () => {
		const { member } = world.users;
		const secondGreen = await world.db.createGroup({
			name: "Another Green Group",
			partyId: world.groups.green.partyId,
		});
		await joinGroup(world.db, member, secondGreen);
		await joinGroup(world.db, member, world.groups.blue);

		const { memberships } = await accessContext(world, member);

		expect(memberships.locals.map((local) => local.name)).toEqual([
			"Northside",
			"Southside",
		]);
		expect(memberships.councils.map((council) => council.name)).toEqual([
			"Northside Council",
			"Southside Council",
		]);
	});

	it("ignores inactive memberships", async () => {
		const { member } = world.users;
		const [record] = await world.db.getActiveGroupMembershipsForUser(member.id);
		await world.db.updateGroupMember(record.membership.id, { isActive: false });

		const { memberships } = await accessContext(world, member);

		expect(memberships.groupMemberships).toEqual([]);
		expect(memberships.councils).toEqual([]);
	});

	it("gives superusers every active local and council", async () => {
		await world.db.updateCouncil(world.councils.south.id, { isActive: false });

		const { memberships } = await accessContext(world, world.users.superuser);

		expect(memberships.groupMemberships).toEqual([]);
		expect(memberships.locals.map((local) => local.name)).toEqual([
			"Northside",
			"Southside",
		]);
		expect(memberships.councils.map((council) => council.name)).toEqual([
			"Northside Council",
		]);
	});

	it("keeps substitutes out of the committee set and lists their meetings", async () => {
		const { loner, outsider } = world.users;
		const { finance, planning } = world.committees;
		await world.db.addCommitteeMember(finance.id, loner.id);
		await world.db.addCommitteeMember(finance.id, outsider.id, "member", false);
		const regular = await world.db.addCommitteeMember(planning.id, outsider.id);
		const substitute = await world.db.addCommitteeMember(
			planning.id,
			loner.id,
			"substitute_member",
		);
		const meeting = await world.db.createCommitteeMeeting({
			committeeId: planning.id,
			scheduledDate: new Date("2030-05-05T18:00:00Z"),
		});
		await world.db.addSubstitute(meeting.id, regular.id, substitute.id);

		const lonerView = await accessContext(world, loner);
		const outsiderView = await accessContext(world, outsider);

		expect(lonerView.memberships.committeeIds).toEqual([finance.id]);
		expect(lonerView.memberships.substituteMeetingIds).toEqual([meeting.id]);
		expect(outsiderView.memberships.committeeIds).toEqual([planning.id]);
	});
});
