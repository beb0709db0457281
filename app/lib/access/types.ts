import type {
	Council,
	Group,
	GroupMembershipRecord,
	Local,
	StructuralRole,
} from "~/db";
import type { EntityType } from "~/db/types";
import type { PermissionName } from "~/lib/permissions";

export type AccessAction =
	| "view"
	| "list"
	| "create"
	| "edit"
	| "delete"
	| "vote"
	| "comment";

/**
 * The identity the engine decides for. Built once per request from the
 * session user and their role.
 */
export interface AccessUser {
	id: string;
	email: string;
	name: string;
	isSuperuser: boolean;
	language: string;
	role: {
		id: string;
		name: string;
		isActive: boolean;
		permissions: ReadonlySet<PermissionName>;
	} | null;
}

/**
 * What an action is aimed at. Omitted ids mean the type as a whole
 * (a list page, or a create form without a preselected parent).
 */
export type AccessTarget =
	| { type: "user"; id?: string }
	| { type: "role"; id?: string }
	| { type: "group"; id?: string }
	| { type: "groupmember"; id?: string; groupId?: string }
	| { type: "groupmeeting"; id?: string; groupId?: string }
	| { type: "motion"; id?: string; groupId?: string }
	| { type: "inquiry"; id?: string; groupId?: string }
	| { type: "local"; id?: string }
	| { type: "council"; id?: string; localId?: string }
	| {
			type: "session";
			id?: string;
			councilId?: string;
			committeeId?: string | null;
	  }
	| { type: "committee"; id?: string; councilId?: string }
	| {
			type: "committeemeeting";
			id?: string;
			committeeId?: string;
			councilId?: string;
	  };

/** A group as seen through one of the user's memberships */
export interface GroupAccessEntry {
	group: Group;
	roles: StructuralRole[];
	isLeader: boolean;
	isAdmin: boolean;
}

export interface ResolvedMemberships {
	groupMemberships: GroupMembershipRecord[];
	leaderGroups: GroupAccessEntry[];
	adminGroups: GroupAccessEntry[];
	allGroups: GroupAccessEntry[];
	locals: Local[];
	councils: Council[];
	committeeIds: string[];
	substituteMeetingIds: string[];
}

export const EMPTY_MEMBERSHIPS: ResolvedMemberships = {
	groupMemberships: [],
	leaderGroups: [],
	adminGroups: [],
	allGroups: [],
	locals: [],
	councils: [],
	committeeIds: [],
	substituteMeetingIds: [],
};

export function targetOf(target: AccessTarget | EntityType): AccessTarget {
	return typeof target === "string" ? { type: target } : target;
}
