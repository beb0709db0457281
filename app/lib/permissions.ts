/**
 * RBAC Permissions - Single Source of Truth
 *
 * This file defines ALL permission strings a role may hold.
 * Use these constants throughout the app for type safety and consistency.
 *
 * IMPORTANT: To add a new permission:
 * 1. Add the permission definition below (key + translationKey + category)
 * 2. Add translations to all locale files in public/locales/{lang}/common.json
 * 3. Assign it to roles via scripts/seed-rbac.ts
 *
 * Permission format: "<domain>.<action>"
 * Examples: "motion.view", "group.edit"
 *
 * Users and roles have no permission strings: only superusers manage them.
 */

import type { EntityType } from "~/db/types";

export interface PermissionDefinition {
	translationKey: string;
	category: string;
}

/**
 * All available permissions in the system
 */
export const PERMISSIONS = {
	// Groups, their members and meetings
	"group.view": { translationKey: "permissions.group.view", category: "Groups" },
	"group.create": {
		translationKey: "permissions.group.create",
		category: "Groups",
	},
	"group.edit": { translationKey: "permissions.group.edit", category: "Groups" },
	"group.delete": {
		translationKey: "permissions.group.delete",
		category: "Groups",
	},

	// Motions
	"motion.view": {
		translationKey: "permissions.motion.view",
		category: "Motions",
	},
	"motion.create": {
		translationKey: "permissions.motion.create",
		category: "Motions",
	},
	"motion.edit": {
		translationKey: "permissions.motion.edit",
		category: "Motions",
	},
	"motion.delete": {
		translationKey: "permissions.motion.delete",
		category: "Motions",
	},
	"motion.vote": {
		translationKey: "permissions.motion.vote",
		category: "Motions",
	},
	"motion.comment": {
		translationKey: "permissions.motion.comment",
		category: "Motions",
	},

	// Inquiries
	"inquiry.view": {
		translationKey: "permissions.inquiry.view",
		category: "Inquiries",
	},
	"inquiry.create": {
		translationKey: "permissions.inquiry.create",
		category: "Inquiries",
	},
	"inquiry.edit": {
		translationKey: "permissions.inquiry.edit",
		category: "Inquiries",
	},
	"inquiry.delete": {
		translationKey: "permissions.inquiry.delete",
		category: "Inquiries",
	},

	// Locals, councils, sessions and committees
	"local.view": { translationKey: "permissions.local.view", category: "Locals" },
	"local.create": {
		translationKey: "permissions.local.create",
		category: "Locals",
	},
	"local.edit": { translationKey: "permissions.local.edit", category: "Locals" },
	"local.delete": {
		translationKey: "permissions.local.delete",
		category: "Locals",
	},
} as const;

/**
 * Permission name type (union of all permission keys)
 */
export type PermissionName = keyof typeof PERMISSIONS;

export type PermissionDomain =
	| "group"
	| "motion"
	| "inquiry"
	| "local";

/** Actions a permission string can grant. Listing is covered by `view`. */
export type PermissionAction =
	| "view"
	| "create"
	| "edit"
	| "delete"
	| "vote"
	| "comment";

/**
 * Check if a string is a valid permission name
 */
export function isValidPermission(name: string): name is PermissionName {
	return Object.hasOwn(PERMISSIONS, name);
}

/**
 * Get all permission names as an array
 */
export const PERMISSION_NAMES: PermissionName[] =
	Object.keys(PERMISSIONS).filter(isValidPermission);

/**
 * Permission domain that governs each entity type.
 * Users and roles belong to none.
 */
export const ENTITY_DOMAIN: { readonly [K in EntityType]?: PermissionDomain } = {
	group: "group",
	groupmember: "group",
	groupmeeting: "group",
	motion: "motion",
	inquiry: "inquiry",
	local: "local",
	council: "local",
	session: "local",
	committee: "local",
	committeemeeting: "local",
};

/**
 * Permission string that grants `action` on an entity type, or null when
 * no role can be given it
 */
export function permissionFor(
	entityType: EntityType,
	action: PermissionAction,
): PermissionName | null {
	const domain = ENTITY_DOMAIN[entityType];
	if (!domain) return null;
	const name = `${domain}.${action}`;
	return isValidPermission(name) ? name : null;
}

/**
 * Keep the recognised permission strings of a stored role.
 * Unknown strings never grant anything.
 */
export function parsePermissions(
	stored: readonly string[],
	roleName?: string,
): ReadonlySet<PermissionName> {
	const granted = new Set<PermissionName>();
	for (const name of stored) {
		if (isValidPermission(name)) {
			granted.add(name);
		} else {
			console.warn(
				`[Access] Ignoring unknown permission "${name}"${roleName ? ` on role ${roleName}` : ""}`,
			);
		}
	}
	return granted;
}

/**
 * Get permissions grouped by category
 */
export function getPermissionsByCategory(): Record<
	string,
	{ name: PermissionName; definition: PermissionDefinition }[]
> {
	const grouped: Record<
		string,
		{ name: PermissionName; definition: PermissionDefinition }[]
	> = {};

	for (const name of PERMISSION_NAMES) {
		const definition = PERMISSIONS[name];
		const category = definition.category;
		if (!grouped[category]) {
			grouped[category] = [];
		}
		grouped[category].push({ name, definition });
	}

	return grouped;
}
