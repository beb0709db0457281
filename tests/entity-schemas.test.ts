import { beforeEach, describe, expect, it } from "vitest";
import type { AccessUser } from "~/lib/access/types";
import { toSafeDeleteError } from "~/lib/actions/generic-delete.server";
import { ENTITY_SCHEMAS, formFields } from "~/lib/entity-schemas";
import { ForeignKeyViolation } from "./helpers/memory-database";
import { accessContext, createWorld, type World } from "./helpers/world";

let world: World;
let superuser: AccessUser;

async function rejection(promise: Promise<unknown>): Promise<Response> {
	try {
		await promise;
	} catch (error) {
		if (error instanceof Response) return error;
		throw error;
	}
	throw new Error("expected a rejected response");
}

describe("entity schemas", () => {
	beforeEach(async () => {
		world = await createWorld();
		superuser = (await accessContext(world, world.users.superuser)).user;
	});

	it("collects repeated form keys as arrays", () => {
		const data = new FormData();
		data.append("name", "Clerk");
		data.append("permissions", "motion.view");
		data.append("permissions", "inquiry.view");

		expect(formFields(data)).toEqual({
			name: "Clerk",
			permissions: ["motion.view", "inquiry.view"],
		});
	});

	it("creates a role from checkbox values", async () => {
		const created = await ENTITY_SCHEMAS.role.createItem(
			world.db,
			{ name: "Clerk", permissions: ["motion.view", "inquiry.view"], isActive: "on" },
			superuser,
		);

		expect(created.record).toMatchObject({
			name: "Clerk",
			permissions: ["motion.view", "inquiry.view"],
			isActive: true,
		});
		expect(created.target).toEqual({ type: "role", id: created.record.id });
	});

	it("rejects unknown permission strings", async () => {
		const response = await rejection(
			ENTITY_SCHEMAS.role.createItem(
				world.db,
				{ name: "Clerk", permissions: "motion.view, motion.approve" },
				superuser,
			),
		);

		expect(response.status).toBe(400);
		expect(await response.json()).toEqual({
			error: "Invalid input",
			fields: ["permissions.1"],
		});
	});

	it("treats a blank committee as a plain council session", async () => {
		const created = await ENTITY_SCHEMAS.session.createItem(
			world.db,
			{
				councilId: world.councils.north.id,
				committeeId: "",
				scheduledDate: "2030-06-01T18:00:00Z",
				title: "June session",
			},
			superuser,
		);

		expect(created.target).toEqual({
			type: "session",
			id: created.record.id,
			councilId: world.councils.north.id,
			committeeId: null,
		});
	});

	it("places committee meetings under their committee's council", async () => {
		const created = await ENTITY_SCHEMAS.committeemeeting.createItem(
			world.db,
			{
				committeeId: world.committees.planning.id,
				scheduledDate: "2030-06-02T09:00:00Z",
			},
			superuser,
		);

		expect(created.target).toEqual({
			type: "committeemeeting",
			id: created.record.id,
			committeeId: world.committees.planning.id,
			councilId: world.councils.south.id,
		});
	});

	it("reads the create target from the submitted parent", () => {
		expect(
			ENTITY_SCHEMAS.motion.createTarget({ groupId: world.groups.green.id }),
		).toEqual({ type: "motion", groupId: world.groups.green.id });
		expect(ENTITY_SCHEMAS.motion.createTarget({ groupId: "" })).toEqual({
			type: "motion",
			groupId: undefined,
		});
	});
});

describe("delete errors", () => {
	it("turns a foreign key violation into a 400 naming the blocker", () => {
		const error = new Error("Failed query", {
			cause: new ForeignKeyViolation("users", "users_role_id_roles_id_fk"),
		});

		expect(toSafeDeleteError("role", error)).toEqual({
			status: 400,
			error:
				"Cannot delete this role because other records still reference it. Remove dependent links or records first.",
			blockingDependencies: [
				"Referenced table: users",
				"Constraint: users_role_id_roles_id_fk",
			],
		});
	});

	it("hides anything else behind a generic 500", () => {
		expect(toSafeDeleteError("motion", new Error("connection reset"))).toEqual({
			status: 500,
			error: "Delete failed due to an unexpected server error.",
			blockingDependencies: [],
		});
	});
});
