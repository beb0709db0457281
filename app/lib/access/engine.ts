import type { EntityType, StructuralRole } from "~/db/types";
import { permissionFor } from "~/lib/permissions";
import {
	ADMIN_LIST_TYPES,
	ADMIN_ONLY_TYPES,
	CHAIN_LIST_TYPES,
	MEMBER_GROUP_ACTIONS,
	STRUCTURAL_POLICY,
} from "./policy";
import {
	type AccessAction,
	type AccessTarget,
	type AccessUser,
	EMPTY_MEMBERSHIPS,
	type ResolvedMemberships,
	targetOf,
} from "./types";

/** Group that owns the target, when the target is group-scoped */
function owningGroupId(target: AccessTarget): string | undefined {
	switch (target.type) {
		case "group":
			return target.id;
		case "groupmember":
		case "groupmeeting":
		case "motion":
		case "inquiry":
			return target.groupId;
		default:
			return undefined;
	}
}

function hasRolePermission(
	user: AccessUser,
	action: AccessAction,
	type: EntityType,
): boolean {
	if (!user.role?.isActive) return false;
	const permission = permissionFor(type, action === "list" ? "view" : action);
	return permission !== null && user.role.permissions.has(permission);
}

function hasStructuralRole(
	memberships: ResolvedMemberships,
	action: AccessAction,
	target: AccessTarget,
): boolean {
	const allowed: readonly StructuralRole[] | undefined =
		STRUCTURAL_POLICY[target.type]?.[action];
	if (!allowed) return false;

	const groupId = owningGroupId(target);
	const holds = (roles: StructuralRole[]) =>
		roles.some((role) => allowed.includes(role));

	if (groupId === undefined) {
		// Creating without a preselected group: any group where the role is held
		return (
			action === "create" &&
			memberships.groupMemberships.some((record) => holds(record.roles))
		);
	}
	return memberships.groupMemberships.some(
		(record) => record.group.id === groupId && holds(record.roles),
	);
}

function hasMembershipVisibility(
	memberships: ResolvedMemberships,
	action: AccessAction,
	target: AccessTarget,
): boolean {
	const groupActions = MEMBER_GROUP_ACTIONS[target.type];
	if (groupActions) {
		if (!groupActions.includes(action)) return false;
		const groupId = owningGroupId(target);
		if (groupId === undefined) {
			return (
				(action === "list" || action === "create") &&
				memberships.groupMemberships.length > 0
			);
		}
		return memberships.groupMemberships.some(
			(record) => record.group.id === groupId,
		);
	}

	if (action === "list") {
		return (
			CHAIN_LIST_TYPES.includes(target.type) &&
			(memberships.groupMemberships.length > 0 ||
				memberships.committeeIds.length > 0)
		);
	}
	if (action !== "view") return false;

	const inCouncils = (councilId: string | undefined) =>
		councilId !== undefined &&
		memberships.councils.some((council) => council.id === councilId);

	switch (target.type) {
		case "local":
			return memberships.locals.some((local) => local.id === target.id);
		case "council":
			return inCouncils(target.id);
		case "session":
			return inCouncils(target.councilId);
		case "committee":
			return (
				inCouncils(target.councilId) ||
				(target.id !== undefined && memberships.committeeIds.includes(target.id))
			);
		case "committeemeeting":
			return (
				(target.committeeId !== undefined &&
					memberships.committeeIds.includes(target.committeeId)) ||
				(target.id !== undefined &&
					memberships.substituteMeetingIds.includes(target.id)) ||
				inCouncils(target.councilId)
			);
		default:
			return false;
	}
}

/**
 * Decide whether `user` may perform `action` on `target`.
 * First matching rule wins; anything unmatched is denied.
 */
export function can(
	user: AccessUser | null,
	memberships: ResolvedMemberships | null,
	action: AccessAction,
	target: AccessTarget | EntityType,
): boolean {
	if (!user) return false;
	if (user.isSuperuser) return true;

	const resolved = targetOf(target);
	if (ADMIN_ONLY_TYPES.includes(resolved.type)) return false;
	if (action === "list" && ADMIN_LIST_TYPES.includes(resolved.type)) {
		return false;
	}
	if (hasRolePermission(user, action, resolved.type)) return true;

	const scope = memberships ?? EMPTY_MEMBERSHIPS;
	if (hasStructuralRole(scope, action, resolved)) return true;
	return hasMembershipVisibility(scope, action, resolved);
}
