import {
	boolean,
	index,
	pgTable,
	text,
	timestamp,
	unique,
	uuid,
} from "drizzle-orm/pg-core";
import type {
	CommitteeRole,
	CommitteeType,
	GroupMeetingStatus,
	MotionStatus,
	MotionVoteChoice,
	SessionStatus,
	StructuralRole,
} from "./types";

export * from "./types";

// ============================================
// RBAC (Role-Based Access Control) System
// ============================================

/**
 * Roles table schema
 * Superuser-defined roles that can be assigned to users
 *
 * IMPORTANT: Permission definitions are stored in app/lib/permissions.ts
 * The `permissions` array on each role stores permission NAME strings
 * that must match keys defined in the PERMISSIONS constant.
 * Unknown strings are ignored when a role is loaded.
 */
export const roles = pgTable("roles", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull().unique(), // e.g., "Editor"
	description: text("description"),
	// Permission names (e.g., ["motion.view", "group.edit"])
	permissions: text("permissions").array().notNull().default([]),
	isActive: boolean("is_active").notNull().default(true),
	createdAt: timestamp("created_at").defaultNow().notNull(),
	updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export type Role = typeof roles.$inferSelect;
export type NewRole = typeof roles.$inferInsert;

/**
 * Users table schema
 * A user references at most one role. Roles are shared, so deleting a
 * role that is still referenced is rejected by the foreign key.
 */
export const users = pgTable("users", {
	id: uuid("id").primaryKey().defaultRandom(),
	email: text("email").notNull().unique(),
	name: text("name").notNull(),
	isSuperuser: boolean("is_superuser").notNull().default(false),
	isActive: boolean("is_active").notNull().default(true),
	roleId: uuid("role_id").references(() => roles.id, {
		onDelete: "restrict",
	}),
	language: text("language").notNull().default("en"),
	createdAt: timestamp("created_at").defaultNow().notNull(),
	updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

// ============================================
// Political structure
// Group -> Party -> Local -> Council
// ============================================

/**
 * Administrative district
 */
export const locals = pgTable("locals", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull().unique(),
	code: text("code").notNull().unique(),
	description: text("description"),
	isActive: boolean("is_active").notNull().default(true),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Local = typeof locals.$inferSelect;
export type NewLocal = typeof locals.$inferInsert;

/**
 * Each local has at most one council
 */
export const councils = pgTable("councils", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull(),
	localId: uuid("local_id")
		.references(() => locals.id, { onDelete: "cascade" })
		.notNull()
		.unique(),
	isActive: boolean("is_active").notNull().default(true),
	// Label for this council's sessions in calendars; blank uses the default term
	calendarBadgeName: text("calendar_badge_name").notNull().default(""),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Council = typeof councils.$inferSelect;
export type NewCouncil = typeof councils.$inferInsert;

export const parties = pgTable("parties", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull(),
	shortName: text("short_name"),
	localId: uuid("local_id").references(() => locals.id, {
		onDelete: "cascade",
	}),
	isActive: boolean("is_active").notNull().default(true),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Party = typeof parties.$inferSelect;
export type NewParty = typeof parties.$inferInsert;

/**
 * Political group within a party
 */
export const groups = pgTable("party_groups", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull(),
	shortName: text("short_name"),
	partyId: uuid("party_id").references(() => parties.id, {
		onDelete: "cascade",
	}),
	isActive: boolean("is_active").notNull().default(true),
	calendarBadgeName: text("calendar_badge_name").notNull().default(""),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Group = typeof groups.$inferSelect;
export type NewGroup = typeof groups.$inferInsert;

/**
 * Membership of a user in a political group
 * Structural roles live in group_member_roles (many-to-many)
 */
export const groupMembers = pgTable(
	"group_members",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		userId: uuid("user_id")
			.references(() => users.id, { onDelete: "cascade" })
			.notNull(),
		groupId: uuid("group_id")
			.references(() => groups.id, { onDelete: "cascade" })
			.notNull(),
		isActive: boolean("is_active").notNull().default(true),
		notes: text("notes"),
		createdAt: timestamp("created_at").defaultNow().notNull(),
	},
	(t) => ({
		groupMembersUserGroupUnique: unique().on(t.userId, t.groupId),
		groupMembersUserIdx: index("group_members_user_idx").on(t.userId),
	}),
);

export type GroupMember = typeof groupMembers.$inferSelect;
export type NewGroupMember = typeof groupMembers.$inferInsert;

export const groupMemberRoles = pgTable(
	"group_member_roles",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		groupMemberId: uuid("group_member_id")
			.references(() => groupMembers.id, { onDelete: "cascade" })
			.notNull(),
		role: text("role").$type<StructuralRole>().notNull(),
	},
	(t) => ({
		groupMemberRolesUnique: unique().on(t.groupMemberId, t.role),
	}),
);

export type GroupMemberRole = typeof groupMemberRoles.$inferSelect;

// ============================================
// Committees
// ============================================

export const committees = pgTable("committees", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull(),
	abbreviation: text("abbreviation"),
	councilId: uuid("council_id")
		.references(() => councils.id, { onDelete: "cascade" })
		.notNull(),
	committeeType: text("committee_type")
		.$type<CommitteeType>()
		.notNull()
		.default("committee"),
	isActive: boolean("is_active").notNull().default(true),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Committee = typeof committees.$inferSelect;
export type NewCommittee = typeof committees.$inferInsert;

export const committeeMembers = pgTable(
	"committee_members",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		committeeId: uuid("committee_id")
			.references(() => committees.id, { onDelete: "cascade" })
			.notNull(),
		userId: uuid("user_id")
			.references(() => users.id, { onDelete: "cascade" })
			.notNull(),
		role: text("role").$type<CommitteeRole>().notNull().default("member"),
		isActive: boolean("is_active").notNull().default(true),
		createdAt: timestamp("created_at").defaultNow().notNull(),
	},
	(t) => ({
		committeeMembersUnique: unique().on(t.committeeId, t.userId),
	}),
);

export type CommitteeMember = typeof committeeMembers.$inferSelect;
export type NewCommitteeMember = typeof committeeMembers.$inferInsert;

export const committeeMeetings = pgTable("committee_meetings", {
	id: uuid("id").primaryKey().defaultRandom(),
	committeeId: uuid("committee_id")
		.references(() => committees.id, { onDelete: "cascade" })
		.notNull(),
	title: text("title").notNull().default(""),
	scheduledDate: timestamp("scheduled_date", { withTimezone: true }).notNull(),
	location: text("location").notNull().default(""),
	description: text("description"),
	isActive: boolean("is_active").notNull().default(true),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type CommitteeMeeting = typeof committeeMeetings.$inferSelect;
export type NewCommitteeMeeting = typeof committeeMeetings.$inferInsert;

/**
 * A substitute member attends one committee meeting in place of a regular member
 */
export const committeeParticipationSubstitutes = pgTable(
	"committee_participation_substitutes",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		committeeMeetingId: uuid("committee_meeting_id")
			.references(() => committeeMeetings.id, { onDelete: "cascade" })
			.notNull(),
		memberId: uuid("member_id")
			.references(() => committeeMembers.id, { onDelete: "cascade" })
			.notNull(),
		substituteMemberId: uuid("substitute_member_id")
			.references(() => committeeMembers.id, { onDelete: "cascade" })
			.notNull(),
	},
	(t) => ({
		meetingMemberUnique: unique("committee_participation_meeting_member_uniq").on(
			t.committeeMeetingId,
			t.memberId,
		),
		meetingSubstituteUnique: unique("committee_participation_meeting_sub_uniq").on(
			t.committeeMeetingId,
			t.substituteMemberId,
		),
	}),
);

export type CommitteeParticipationSubstitute =
	typeof committeeParticipationSubstitutes.$inferSelect;

// ============================================
// Council sessions and group meetings
// ============================================

export const sessions = pgTable(
	"sessions",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		title: text("title").notNull().default(""),
		councilId: uuid("council_id")
			.references(() => councils.id, { onDelete: "cascade" })
			.notNull(),
		// Set for sessions attached to a committee; null for plain council sessions
		committeeId: uuid("committee_id").references(() => committees.id, {
			onDelete: "cascade",
		}),
		status: text("status")
			.$type<SessionStatus>()
			.notNull()
			.default("scheduled"),
		scheduledDate: timestamp("scheduled_date", { withTimezone: true }).notNull(),
		location: text("location").notNull().default(""),
		agenda: text("agenda"),
		isActive: boolean("is_active").notNull().default(true),
		createdAt: timestamp("created_at").defaultNow().notNull(),
	},
	(t) => ({
		sessionsCouncilDateIdx: index("sessions_council_date_idx").on(
			t.councilId,
			t.scheduledDate,
		),
	}),
);

export type Session = typeof sessions.$inferSelect;
export type NewSession = typeof sessions.$inferInsert;

export const sessionExcuses = pgTable(
	"session_excuses",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		sessionId: uuid("session_id")
			.references(() => sessions.id, { onDelete: "cascade" })
			.notNull(),
		userId: uuid("user_id")
			.references(() => users.id, { onDelete: "cascade" })
			.notNull(),
		createdAt: timestamp("created_at").defaultNow().notNull(),
	},
	(t) => ({
		sessionExcusesUnique: unique().on(t.sessionId, t.userId),
	}),
);

export type SessionExcuse = typeof sessionExcuses.$inferSelect;

export const groupMeetings = pgTable("group_meetings", {
	id: uuid("id").primaryKey().defaultRandom(),
	groupId: uuid("group_id")
		.references(() => groups.id, { onDelete: "cascade" })
		.notNull(),
	title: text("title").notNull().default(""),
	scheduledDate: timestamp("scheduled_date", { withTimezone: true }).notNull(),
	location: text("location").notNull().default(""),
	status: text("status")
		.$type<GroupMeetingStatus>()
		.notNull()
		.default("scheduled"),
	isActive: boolean("is_active").notNull().default(true),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type GroupMeeting = typeof groupMeetings.$inferSelect;
export type NewGroupMeeting = typeof groupMeetings.$inferInsert;

// ============================================
// Motions and inquiries
// ============================================

export const motions = pgTable("motions", {
	id: uuid("id").primaryKey().defaultRandom(),
	title: text("title").notNull(),
	text: text("text").notNull().default(""),
	groupId: uuid("group_id")
		.references(() => groups.id, { onDelete: "cascade" })
		.notNull(),
	sessionId: uuid("session_id").references(() => sessions.id, {
		onDelete: "set null",
	}),
	submittedById: uuid("submitted_by_id").references(() => users.id, {
		onDelete: "set null",
	}),
	status: text("status").$type<MotionStatus>().notNull().default("draft"),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Motion = typeof motions.$inferSelect;
export type NewMotion = typeof motions.$inferInsert;

/**
 * One vote per user and motion; voting again replaces the earlier choice
 */
export const motionVotes = pgTable(
	"motion_votes",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		motionId: uuid("motion_id")
			.references(() => motions.id, { onDelete: "cascade" })
			.notNull(),
		voterId: uuid("voter_id")
			.references(() => users.id, { onDelete: "cascade" })
			.notNull(),
		vote: text("vote").$type<MotionVoteChoice>().notNull(),
		reason: text("reason").notNull().default(""),
		votedAt: timestamp("voted_at").defaultNow().notNull(),
	},
	(t) => ({
		motionVotesMotionVoterUnique: unique().on(t.motionId, t.voterId),
	}),
);

export type MotionVote = typeof motionVotes.$inferSelect;
export type NewMotionVote = typeof motionVotes.$inferInsert;

export const motionComments = pgTable(
	"motion_comments",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		motionId: uuid("motion_id")
			.references(() => motions.id, { onDelete: "cascade" })
			.notNull(),
		authorId: uuid("author_id")
			.references(() => users.id, { onDelete: "cascade" })
			.notNull(),
		content: text("content").notNull(),
		// Private comments are shown to their author only
		isPublic: boolean("is_public").notNull().default(true),
		createdAt: timestamp("created_at").defaultNow().notNull(),
	},
	(t) => ({
		motionCommentsMotionIdx: index("motion_comments_motion_idx").on(t.motionId),
	}),
);

export type MotionComment = typeof motionComments.$inferSelect;
export type NewMotionComment = typeof motionComments.$inferInsert;

export const inquiries = pgTable("inquiries", {
	id: uuid("id").primaryKey().defaultRandom(),
	title: text("title").notNull(),
	text: text("text").notNull().default(""),
	groupId: uuid("group_id")
		.references(() => groups.id, { onDelete: "cascade" })
		.notNull(),
	sessionId: uuid("session_id").references(() => sessions.id, {
		onDelete: "set null",
	}),
	submittedById: uuid("submitted_by_id").references(() => users.id, {
		onDelete: "set null",
	}),
	status: text("status").$type<MotionStatus>().notNull().default("draft"),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Inquiry = typeof inquiries.$inferSelect;
export type NewInquiry = typeof inquiries.$inferInsert;

// ============================================
// Calendar subscription
// ============================================

/**
 * Calendar feed tokens
 * Only the SHA-256 hash of a token is stored; the raw token is shown once.
 */
export const calendarFeedTokens = pgTable("calendar_feed_tokens", {
	id: uuid("id").primaryKey().defaultRandom(),
	userId: uuid("user_id")
		.references(() => users.id, { onDelete: "cascade" })
		.notNull()
		.unique(),
	tokenHash: text("token_hash").notNull().unique(),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type CalendarFeedToken = typeof calendarFeedTokens.$inferSelect;
