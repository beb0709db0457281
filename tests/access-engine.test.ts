import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { User } from "~/db";
import { can } from "~/lib/access/engine";
import type { AccessAction, AccessTarget } from "~/lib/access/types";
import { EMPTY_MEMBERSHIPS } from "~/lib/access/types";
import type { EntityType } from "~/db/types";
import { accessContext, createWorld, joinGroup, type World } from "./helpers/world";

let world: World;

async function allowed(
	user: User,
	action: AccessAction,
	target: AccessTarget | EntityType,
): Promise<boolean> {
	const context = await accessContext(world, user);
	return can(context.user, context.memberships, action, target);
}

describe("access decision engine", () => {
	beforeEach(async () => {
		world = await createWorld();
	});

	it("denies anonymous users everything", () => {
		expect(can(null, null, "view", { type: "group", id: world.groups.green.id })).toBe(
			false,
		);
		expect(can(null, EMPTY_MEMBERSHIPS, "list", "motion")).toBe(false);
	});

	it("allows superusers every action, including admin lists", async () => {
		const { superuser } = world.users;
		expect(await allowed(superuser, "list", "user")).toBe(true);
		expect(await allowed(superuser, "delete", { type: "role", id: world.roles.editor.id })).toBe(true);
		expect(
			await allowed(superuser, "delete", { type: "group", id: world.groups.blue.id }),
		).toBe(true);
	});

	it("keeps the local list for superusers even when a role grants view", async () => {
		const auditor = await world.db.createRole({
			name: "Auditor",
			permissions: ["local.view"],
		});
		const loner = await world.db.updateUser(world.users.loner.id, {
			roleId: auditor.id,
		});
		if (!loner) throw new Error("loner missing");

		expect(await allowed(loner, "list", "local")).toBe(false);
		expect(await allowed(loner, "view", { type: "local", id: world.locals.south.id })).toBe(
			true,
		);
	});

	describe("users and roles", () => {
		afterEach(() => {
			vi.restoreAllMocks();
		});

		it("stay out of reach of every non-superuser, whatever their role stores", async () => {
			vi.spyOn(console, "warn").mockImplementation(() => {});
			const clerk = await world.db.createRole({
				name: "Clerk",
				permissions: ["role.edit", "user.edit", "user.view", "group.edit"],
			});
			const loner = await world.db.updateUser(world.users.loner.id, {
				roleId: clerk.id,
			});
			if (!loner) throw new Error("loner missing");

			const roleTarget = { type: "role", id: clerk.id } as const;
			const selfTarget = { type: "user", id: loner.id } as const;
			for (const user of [loner, world.users.staff, world.users.leader]) {
				for (const action of ["view", "list", "create", "edit", "delete"] as const) {
					expect(await allowed(user, action, roleTarget)).toBe(false);
					expect(await allowed(user, action, selfTarget)).toBe(false);
				}
			}
			// the recognised part of the role still works
			expect(await allowed(loner, "edit", { type: "group", id: world.groups.blue.id })).toBe(
				true,
			);
		});

		it("stay open to superusers", async () => {
			const { superuser } = world.users;
			expect(await allowed(superuser, "edit", { type: "role", id: world.roles.editor.id })).toBe(
				true,
			);
			expect(
				await allowed(superuser, "edit", { type: "user", id: world.users.member.id }),
			).toBe(true);
		});
	});

	describe("motion voting and comments", () => {
		it("come from a role permission, never from membership", async () => {
			const voter = await world.db.createRole({
				name: "Voter",
				permissions: ["motion.vote"],
			});
			const loner = await world.db.updateUser(world.users.loner.id, {
				roleId: voter.id,
			});
			if (!loner) throw new Error("loner missing");
			const motion = { type: "motion", id: "m-1", groupId: world.groups.green.id } as const;

			expect(await allowed(loner, "vote", motion)).toBe(true);
			expect(await allowed(loner, "comment", motion)).toBe(false);
			expect(await allowed(world.users.member, "vote", motion)).toBe(false);
			expect(await allowed(world.users.leader, "vote", motion)).toBe(false);
			expect(await allowed(world.users.leader, "comment", motion)).toBe(false);
			expect(await allowed(world.users.superuser, "vote", motion)).toBe(true);
		});
	});

	it("lets a role permission allow what structure would deny", async () => {
		const { staff } = world.users;
		const blueMotion = { type: "motion", id: "m-1", groupId: world.groups.blue.id } as const;

		expect(await allowed(staff, "edit", blueMotion)).toBe(true);
		expect(await allowed(staff, "view", blueMotion)).toBe(true);
		expect(await allowed(staff, "list", "motion")).toBe(true);
		expect(await allowed(staff, "delete", blueMotion)).toBe(false);
		// group.edit also covers group members
		expect(
			await allowed(staff, "edit", {
				type: "groupmember",
				id: "gm-1",
				groupId: world.groups.blue.id,
			}),
		).toBe(true);
	});

	it("ignores the permissions of an inactive role", async () => {
		const loner = await world.db.updateUser(world.users.loner.id, {
			roleId: world.roles.inactive.id,
		});
		if (!loner) throw new Error("loner missing");

		expect(
			await allowed(loner, "delete", {
				type: "motion",
				id: "m-1",
				groupId: world.groups.green.id,
			}),
		).toBe(false);
	});

	describe("plain members", () => {
		it("view but do not manage their group's meetings", async () => {
			const { member } = world.users;
			const meeting = {
				type: "groupmeeting",
				id: "meeting-1",
				groupId: world.groups.green.id,
			} as const;

			expect(await allowed(member, "view", meeting)).toBe(true);
			expect(await allowed(member, "edit", meeting)).toBe(false);
			expect(await allowed(member, "delete", meeting)).toBe(false);
			expect(
				await allowed(member, "create", {
					type: "groupmeeting",
					groupId: world.groups.green.id,
				}),
			).toBe(false);
		});

		it("view and edit but do not delete their group's motions and inquiries", async () => {
			const { member } = world.users;
			for (const type of ["motion", "inquiry"] as const) {
				const target = { type, id: "x-1", groupId: world.groups.green.id };
				expect(await allowed(member, "view", target)).toBe(true);
				expect(await allowed(member, "edit", target)).toBe(true);
				expect(await allowed(member, "delete", target)).toBe(false);
				expect(await allowed(member, "create", { type, groupId: world.groups.green.id })).toBe(
					true,
				);
			}
		});

		it("see nothing of other groups", async () => {
			const { member } = world.users;
			expect(
				await allowed(member, "view", {
					type: "motion",
					id: "m-2",
					groupId: world.groups.blue.id,
				}),
			).toBe(false);
			expect(await allowed(member, "view", { type: "group", id: world.groups.blue.id })).toBe(
				false,
			);
		});

		it("may list group content once they belong to any group", async () => {
			expect(await allowed(world.users.member, "list", "motion")).toBe(true);
			expect(await allowed(world.users.loner, "list", "motion")).toBe(false);
		});
	});

	describe("structural roles", () => {
		it("let leaders manage meetings and delete motions of their own group only", async () => {
			const { leader } = world.users;
			const own = { type: "groupmeeting", id: "gm", groupId: world.groups.green.id } as const;
			const other = { type: "groupmeeting", id: "gm", groupId: world.groups.blue.id } as const;

			expect(await allowed(leader, "edit", own)).toBe(true);
			expect(await allowed(leader, "delete", own)).toBe(true);
			expect(await allowed(leader, "edit", other)).toBe(false);
			expect(
				await allowed(leader, "delete", {
					type: "motion",
					id: "m",
					groupId: world.groups.green.id,
				}),
			).toBe(true);
		});

		it("let deputy leaders create meetings without a preselected group", async () => {
			expect(await allowed(world.users.deputy, "create", "groupmeeting")).toBe(true);
			expect(await allowed(world.users.member, "create", "groupmeeting")).toBe(false);
		});

		it("let group admins edit the group and its members but not its meetings", async () => {
			const { groupAdmin } = world.users;
			const greenId = world.groups.green.id;

			expect(await allowed(groupAdmin, "edit", { type: "group", id: greenId })).toBe(true);
			expect(
				await allowed(groupAdmin, "edit", { type: "groupmember", id: "gm", groupId: greenId }),
			).toBe(true);
			expect(
				await allowed(groupAdmin, "edit", { type: "groupmeeting", id: "m", groupId: greenId }),
			).toBe(false);
		});

		it("let group admins and leadership delete their group's motions and inquiries", async () => {
			const greenId = world.groups.green.id;
			for (const type of ["motion", "inquiry"] as const) {
				const own = { type, id: "x-1", groupId: greenId };
				const other = { type, id: "x-2", groupId: world.groups.blue.id };

				expect(await allowed(world.users.groupAdmin, "delete", own)).toBe(true);
				expect(await allowed(world.users.deputy, "delete", own)).toBe(true);
				expect(await allowed(world.users.leader, "delete", own)).toBe(true);
				expect(await allowed(world.users.member, "delete", own)).toBe(false);
				expect(await allowed(world.users.groupAdmin, "delete", other)).toBe(false);
			}
		});

		it("never grant deleting a group", async () => {
			expect(
				await allowed(world.users.leader, "delete", {
					type: "group",
					id: world.groups.green.id,
				}),
			).toBe(false);
		});
	});

	describe("the council chain", () => {
		it("opens the member's local, council, sessions and committees for viewing", async () => {
			const { member } = world.users;
			const { north, south } = world.councils;

			expect(await allowed(member, "view", { type: "local", id: world.locals.north.id })).toBe(
				true,
			);
			expect(await allowed(member, "view", { type: "council", id: north.id })).toBe(true);
			expect(await allowed(member, "view", { type: "council", id: south.id })).toBe(false);
			expect(
				await allowed(member, "view", { type: "session", id: "s", councilId: north.id }),
			).toBe(true);
			expect(
				await allowed(member, "view", {
					type: "committee",
					id: world.committees.finance.id,
					councilId: north.id,
				}),
			).toBe(true);
			expect(
				await allowed(member, "edit", { type: "council", id: north.id, localId: world.locals.north.id }),
			).toBe(false);
		});

		it("opens chain lists to anyone with a group or committee membership", async () => {
			expect(await allowed(world.users.member, "list", "session")).toBe(true);
			expect(await allowed(world.users.loner, "list", "session")).toBe(false);

			await world.db.addCommitteeMember(world.committees.planning.id, world.users.loner.id);
			expect(await allowed(world.users.loner, "list", "committee")).toBe(true);
		});

		it("stops at groups without a party", async () => {
			const { loner } = world.users;
			await joinGroup(world.db, loner, world.groups.orphan);

			expect(await allowed(loner, "view", { type: "group", id: world.groups.orphan.id })).toBe(
				true,
			);
			expect(
				await allowed(loner, "view", { type: "council", id: world.councils.north.id }),
			).toBe(false);
		});
	});

	describe("committees", () => {
		it("let committee members view the committee and its meetings", async () => {
			const { loner } = world.users;
			const { planning } = world.committees;
			await world.db.addCommitteeMember(planning.id, loner.id);

			expect(
				await allowed(loner, "view", {
					type: "committee",
					id: planning.id,
					councilId: world.councils.south.id,
				}),
			).toBe(true);
			expect(
				await allowed(loner, "view", {
					type: "committeemeeting",
					id: "cm",
					committeeId: planning.id,
					councilId: world.councils.south.id,
				}),
			).toBe(true);
		});

		it("let a substitute view only the meeting they stand in for", async () => {
			const { loner, outsider } = world.users;
			const { planning } = world.committees;
			const regular = await world.db.addCommitteeMember(planning.id, outsider.id);
			const substitute = await world.db.addCommitteeMember(
				planning.id,
				loner.id,
				"substitute_member",
			);
			const meeting = await world.db.createCommitteeMeeting({
				committeeId: planning.id,
				title: "Budget hearing",
				scheduledDate: new Date("2030-03-01T17:00:00Z"),
			});
			const otherMeeting = await world.db.createCommitteeMeeting({
				committeeId: planning.id,
				scheduledDate: new Date("2030-04-01T17:00:00Z"),
			});
			await world.db.addSubstitute(meeting.id, regular.id, substitute.id);

			const target = (id: string) =>
				({
					type: "committeemeeting",
					id,
					committeeId: planning.id,
					councilId: world.councils.south.id,
				}) as const;

			expect(await allowed(loner, "view", target(meeting.id))).toBe(true);
			expect(await allowed(loner, "view", target(otherMeeting.id))).toBe(false);
		});
	});

	it("gives the same answer for the same inputs", async () => {
		const context = await accessContext(world, world.users.member);
		const target = { type: "motion", id: "m", groupId: world.groups.green.id } as const;
		const first = can(context.user, context.memberships, "delete", target);
		const second = can(context.user, context.memberships, "delete", target);
		expect(first).toBe(second);
	});
});
