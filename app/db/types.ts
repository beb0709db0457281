/**
 * Types that are safe to import in client-side code.
 * This file has no dependencies on server-only packages like drizzle-orm or postgres.
 */

/**
 * Structural roles a user can hold inside one political group.
 * A membership may carry several of them at once.
 */
export type StructuralRole =
	| "leader"
	| "deputy_leader"
	| "group_admin"
	| "member"
	| "secretary"
	| "treasurer";

export const STRUCTURAL_ROLES = [
	"leader",
	"deputy_leader",
	"group_admin",
	"member",
	"secretary",
	"treasurer",
] as const satisfies readonly StructuralRole[];

export type CommitteeRole =
	| "chairperson"
	| "vice_chairperson"
	| "member"
	| "substitute_member";

export type CommitteeType = "committee" | "commission";

export type SessionStatus =
	| "scheduled"
	| "invited"
	| "in_progress"
	| "completed"
	| "cancelled";

export type GroupMeetingStatus = "scheduled" | "invited" | "cancelled";

export type MotionStatus =
	| "draft"
	| "submitted"
	| "approved"
	| "rejected"
	| "withdrawn";

export type MotionVoteChoice = "yes" | "no" | "abstain" | "absent";

export const MOTION_VOTE_CHOICES = [
	"yes",
	"no",
	"abstain",
	"absent",
] as const satisfies readonly MotionVoteChoice[];

/**
 * Every entity type that has its own access-controlled pages
 */
export type EntityType =
	| "user"
	| "role"
	| "group"
	| "groupmember"
	| "groupmeeting"
	| "motion"
	| "inquiry"
	| "local"
	| "council"
	| "session"
	| "committee"
	| "committeemeeting";
