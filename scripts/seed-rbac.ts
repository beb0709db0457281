/**
 * Seed script for the role system
 * Creates or refreshes the default roles and their permission strings
 *
 * Run with: npm run db:seed
 */

import "dotenv/config";
import postgres from "postgres";
import {
	isValidPermission,
	PERMISSION_NAMES,
	type PermissionName,
} from "../app/lib/permissions";

const connectionString = process.env.DATABASE_URL;
if (!connectionString) {
	console.error("DATABASE_URL environment variable is required");
	process.exit(1);
}

const sql = postgres(connectionString);

interface DefaultRole {
	name: string;
	description: string;
	permissions: string[];
}

// Roles grant access regardless of group membership
const DEFAULT_ROLES: DefaultRole[] = [
	{
		name: "Viewer",
		description: "Read access to every group's content and the council chain",
		permissions: [
			"group.view",
			"motion.view",
			"inquiry.view",
			"local.view",
		],
	},
	{
		name: "Editor",
		description: "Office staff who maintain groups, motions and inquiries",
		permissions: [
			"group.view",
			"group.edit",
			"motion.view",
			"motion.create",
			"motion.edit",
			"motion.comment",
			"inquiry.view",
			"inquiry.create",
			"inquiry.edit",
			"local.view",
			"local.edit",
		],
	},
	{
		name: "Administrator",
		description: "Every role permission; users and roles stay with superusers",
		permissions: [...PERMISSION_NAMES],
	},
];

function validPermissions(role: DefaultRole): PermissionName[] {
	const unknown = role.permissions.filter((name) => !isValidPermission(name));
	if (unknown.length > 0) {
		throw new Error(
			`Role "${role.name}" names unknown permissions: ${unknown.join(", ")}`,
		);
	}
	return role.permissions.filter(isValidPermission);
}

async function seed(): Promise<void> {
	console.log("[Seed] Starting role seed...");

	try {
		for (const role of DEFAULT_ROLES) {
			const permissions = validPermissions(role);
			await sql`
				INSERT INTO roles (name, description, permissions)
				VALUES (${role.name}, ${role.description}, ${sql.array(permissions)})
				ON CONFLICT (name) DO UPDATE SET
					description = EXCLUDED.description,
					permissions = EXCLUDED.permissions,
					updated_at = NOW()
			`;
			console.log(`[Seed]   ${role.name} (${permissions.length} permissions)`);
		}

		console.log(`[Seed] Seeded ${DEFAULT_ROLES.length} roles`);
	} catch (error) {
		console.error("[Seed] Seed failed:", error);
		process.exitCode = 1;
	} finally {
		await sql.end();
	}
}

await seed();
