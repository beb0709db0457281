import type { EntityType, StructuralRole } from "~/db/types";
import type { AccessAction } from "./types";

const LEADERSHIP: readonly StructuralRole[] = ["leader", "deputy_leader"];
const LEAD_OR_ADMIN: readonly StructuralRole[] = [
	"leader",
	"deputy_leader",
	"group_admin",
];

type ActionTable<V> = { readonly [K in EntityType]?: V };

/**
 * Structural roles that authorize an action on an entity of their own group.
 * Deleting a group is never granted by structural role.
 */
export const STRUCTURAL_POLICY: ActionTable<
	Partial<Record<AccessAction, readonly StructuralRole[]>>
> = {
	group: { view: LEAD_OR_ADMIN, edit: LEAD_OR_ADMIN },
	groupmember: { edit: LEAD_OR_ADMIN },
	groupmeeting: {
		view: LEADERSHIP,
		create: LEADERSHIP,
		edit: LEADERSHIP,
		delete: LEADERSHIP,
	},
	motion: { edit: LEADERSHIP, delete: LEAD_OR_ADMIN },
	inquiry: { edit: LEADERSHIP, delete: LEAD_OR_ADMIN },
};

/**
 * Actions any active member gets on their own group's content
 */
export const MEMBER_GROUP_ACTIONS: ActionTable<readonly AccessAction[]> = {
	group: ["view", "list"],
	groupmeeting: ["view", "list"],
	motion: ["view", "list", "create", "edit"],
	inquiry: ["view", "list", "create", "edit"],
};

/**
 * Accounts and roles are managed by superusers only. No role permission or
 * membership grants any action on them.
 */
export const ADMIN_ONLY_TYPES: readonly EntityType[] = ["user", "role"];

/**
 * List pages reserved for superusers, whatever the role holds
 */
export const ADMIN_LIST_TYPES: readonly EntityType[] = ["local"];

/**
 * Types reachable through the Group -> Party -> Local -> Council chain
 * whose list pages are open to anyone with a membership
 */
export const CHAIN_LIST_TYPES: readonly EntityType[] = [
	"council",
	"session",
	"committee",
	"committeemeeting",
];
