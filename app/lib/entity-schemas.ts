import { z } from "zod";
import type {
	Committee,
	CommitteeMeetingWithCouncil,
	Council,
	DatabaseAdapter,
	Group,
	GroupMeeting,
	GroupMemberWithRoles,
	Inquiry,
	Local,
	Motion,
	Role,
	Session,
	User,
} from "~/db";
import type { EntityType } from "~/db/types";
import type { AccessTarget, AccessUser } from "~/lib/access/types";
import { badRequest } from "~/lib/http.server";
import { getPermissionsByCategory, isValidPermission } from "~/lib/permissions";

export type EntityRecord =
	| User
	| Role
	| Group
	| GroupMemberWithRoles
	| GroupMeeting
	| Motion
	| Inquiry
	| Local
	| Council
	| Session
	| Committee
	| CommitteeMeetingWithCouncil;

/** Submitted form values; repeated keys become arrays */
export type FormFields = Record<string, string | string[]>;

export interface LoadedEntity {
	record: EntityRecord;
	target: AccessTarget;
}

/**
 * Entity schema configuration
 * How each entity type is fetched, created, updated and deleted, and where
 * it sits for access decisions
 */
export interface EntitySchema {
	type: EntityType;
	list: (db: DatabaseAdapter) => Promise<LoadedEntity[]>;
	fetchById: (db: DatabaseAdapter, id: string) => Promise<LoadedEntity | null>;
	/** Target of a create action, from query or form values */
	createTarget: (fields: FormFields) => AccessTarget;
	createItem: (
		db: DatabaseAdapter,
		fields: FormFields,
		user: AccessUser,
	) => Promise<LoadedEntity>;
	updateItem: (
		db: DatabaseAdapter,
		id: string,
		fields: FormFields,
	) => Promise<LoadedEntity | null>;
	deleteItem: (db: DatabaseAdapter, id: string) => Promise<boolean>;
	/** Returns a response that blocks the delete, or null to proceed */
	guardDelete?: (db: DatabaseAdapter, id: string) => Promise<Response | null>;
	/** Choices the create and edit forms offer */
	formOptions?: () => Record<string, unknown>;
	/** Extra detail data for the requesting user */
	extend?: (
		db: DatabaseAdapter,
		id: string,
		user: AccessUser,
	) => Promise<Record<string, unknown>>;
}

interface EntityConfig<T extends EntityRecord, C, U> {
	type: EntityType;
	list: (db: DatabaseAdapter) => Promise<T[]>;
	fetchById: (db: DatabaseAdapter, id: string) => Promise<T | null>;
	target: (item: T) => AccessTarget;
	createTarget: (fields: FormFields) => AccessTarget;
	createSchema: z.ZodType<C, z.ZodTypeDef, unknown>;
	updateSchema: z.ZodType<U, z.ZodTypeDef, unknown>;
	create: (db: DatabaseAdapter, values: C, user: AccessUser) => Promise<T>;
	update: (db: DatabaseAdapter, id: string, values: U) => Promise<T | null>;
	deleteItem: (db: DatabaseAdapter, id: string) => Promise<boolean>;
	guardDelete?: EntitySchema["guardDelete"];
	formOptions?: EntitySchema["formOptions"];
	extend?: EntitySchema["extend"];
}

/**
 * Parse form values, turning validation failures into a 400 response
 */
export function parseFields<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	fields: FormFields,
): T {
	const result = schema.safeParse(fields);
	if (!result.success) {
		throw badRequest("Invalid input", {
			fields: result.error.issues.map((issue) => issue.path.join(".")),
		});
	}
	return result.data;
}

function defineEntity<T extends EntityRecord, C, U>(
	config: EntityConfig<T, C, U>,
): EntitySchema {
	const load = (item: T): LoadedEntity => ({
		record: item,
		target: config.target(item),
	});
	return {
		type: config.type,
		list: async (db) => (await config.list(db)).map(load),
		fetchById: async (db, id) => {
			const item = await config.fetchById(db, id);
			return item ? load(item) : null;
		},
		createTarget: config.createTarget,
		createItem: async (db, fields, user) => {
			const values = parseFields(config.createSchema, fields);
			const created = await config.create(db, values, user);
			// Reload so joined columns are present
			const item = (await config.fetchById(db, created.id)) ?? created;
			return load(item);
		},
		updateItem: async (db, id, fields) => {
			const values = parseFields(config.updateSchema, fields);
			const updated = await config.update(db, id, values);
			if (!updated) return null;
			const item = (await config.fetchById(db, id)) ?? updated;
			return load(item);
		},
		deleteItem: config.deleteItem,
		guardDelete: config.guardDelete,
		formOptions: config.formOptions,
		extend: config.extend,
	};
}

// ============================================
// FIELD PARSERS
// ============================================

function single(fields: FormFields, name: string): string | undefined {
	const value = fields[name];
	if (Array.isArray(value)) return value[0];
	return value === "" ? undefined : value;
}

const text = z.string().trim().min(1);
const optionalText = z.string().trim().optional();
const reference = z.string().trim().uuid();
const nullableId = z
	.string()
	.trim()
	.transform((value) => (value === "" ? null : value))
	.pipe(z.string().uuid().nullable());
const flag = z
	.enum(["true", "false", "on", "off"])
	.transform((value) => value === "true" || value === "on");
const scheduledDate = z.coerce.date();

const permissionList = z
	.union([z.string(), z.array(z.string())])
	.transform((value) =>
		(Array.isArray(value) ? value : value.split(","))
			.map((name) => name.trim())
			.filter((name) => name !== ""),
	)
	.pipe(
		z.array(
			z.string().refine(isValidPermission, {
				message: "Unknown permission",
			}),
		),
	);

const sessionStatus = z.enum([
	"scheduled",
	"invited",
	"in_progress",
	"completed",
	"cancelled",
]);
const groupMeetingStatus = z.enum(["scheduled", "invited", "cancelled"]);
const motionStatus = z.enum([
	"draft",
	"submitted",
	"approved",
	"rejected",
	"withdrawn",
]);

// Parent references are fixed at creation, so update schemas leave them out

const userFields = z.object({
	email: z.string().trim().email(),
	name: text,
	roleId: nullableId.optional(),
	language: z.string().trim().min(2).optional(),
	isActive: flag.optional(),
});

const roleFields = z.object({
	name: text,
	description: optionalText,
	permissions: permissionList.optional(),
	isActive: flag.optional(),
});

const localFields = z.object({
	name: text,
	code: text,
	description: optionalText,
	isActive: flag.optional(),
});

const councilFields = z.object({
	name: text,
	isActive: flag.optional(),
	calendarBadgeName: optionalText,
});

const groupFields = z.object({
	name: text,
	shortName: optionalText,
	isActive: flag.optional(),
	calendarBadgeName: optionalText,
});

const groupMemberFields = z.object({
	isActive: flag.optional(),
	notes: optionalText,
});

const groupMeetingFields = z.object({
	title: optionalText,
	scheduledDate,
	location: optionalText,
	status: groupMeetingStatus.optional(),
	isActive: flag.optional(),
});

const committeeFields = z.object({
	name: text,
	abbreviation: optionalText,
	committeeType: z.enum(["committee", "commission"]).optional(),
	isActive: flag.optional(),
});

const committeeMeetingFields = z.object({
	title: optionalText,
	scheduledDate,
	location: optionalText,
	description: optionalText,
	isActive: flag.optional(),
});

const sessionFields = z.object({
	title: optionalText,
	status: sessionStatus.optional(),
	scheduledDate,
	location: optionalText,
	agenda: optionalText,
	isActive: flag.optional(),
});

const motionFields = z.object({
	title: text,
	text: optionalText,
	sessionId: nullableId.optional(),
	status: motionStatus.optional(),
});

// ============================================
// REGISTRY
// ============================================

const groupScoped = (type: "groupmember" | "groupmeeting" | "motion" | "inquiry") =>
	(fields: FormFields): AccessTarget => ({
		type,
		groupId: single(fields, "groupId"),
	});

export const ENTITY_SCHEMAS: Record<EntityType, EntitySchema> = {
	user: defineEntity({
		type: "user",
		list: (db) => db.getAllUsers(),
		fetchById: (db, userId) => db.findUserById(userId),
		target: (user) => ({ type: "user", id: user.id }),
		createTarget: () => ({ type: "user" }),
		createSchema: userFields,
		updateSchema: userFields.partial(),
		create: (db, values) => db.createUser(values),
		update: (db, userId, values) => db.updateUser(userId, values),
		deleteItem: (db, userId) => db.deleteUser(userId),
	}),

	role: defineEntity({
		type: "role",
		list: (db) => db.getAllRoles(),
		fetchById: (db, roleId) => db.getRoleById(roleId),
		target: (role) => ({ type: "role", id: role.id }),
		createTarget: () => ({ type: "role" }),
		createSchema: roleFields,
		updateSchema: roleFields.partial(),
		create: (db, values) => db.createRole(values),
		update: (db, roleId, values) => db.updateRole(roleId, values),
		deleteItem: (db, roleId) => db.deleteRole(roleId),
		guardDelete: async (db, roleId) => {
			const userCount = await db.countUsersWithRole(roleId);
			if (userCount === 0) return null;
			return badRequest(
				"Cannot delete this role because users are still assigned to it.",
				{ userCount },
			);
		},
		formOptions: () => ({ permissionCategories: getPermissionsByCategory() }),
	}),

	group: defineEntity({
		type: "group",
		list: (db) => db.getAllGroups(),
		fetchById: (db, groupId) => db.getGroupById(groupId),
		target: (group) => ({ type: "group", id: group.id }),
		createTarget: () => ({ type: "group" }),
		createSchema: groupFields.extend({ partyId: nullableId.optional() }),
		updateSchema: groupFields.partial(),
		create: (db, values) => db.createGroup(values),
		update: (db, groupId, values) => db.updateGroup(groupId, values),
		deleteItem: (db, groupId) => db.deleteGroup(groupId),
	}),

	groupmember: defineEntity({
		type: "groupmember",
		list: (db) => db.getAllGroupMembers(),
		fetchById: (db, memberId) => db.getGroupMemberById(memberId),
		target: (member) => ({
			type: "groupmember",
			id: member.id,
			groupId: member.groupId,
		}),
		createTarget: groupScoped("groupmember"),
		createSchema: groupMemberFields.extend({ userId: reference, groupId: reference }),
		updateSchema: groupMemberFields.partial(),
		create: async (db, values) => {
			const member = await db.createGroupMember(values);
			return { ...member, roles: [] };
		},
		update: async (db, memberId, values) => {
			const member = await db.updateGroupMember(memberId, values);
			return member ? db.getGroupMemberById(memberId) : null;
		},
		deleteItem: (db, memberId) => db.deleteGroupMember(memberId),
	}),

	groupmeeting: defineEntity({
		type: "groupmeeting",
		list: (db) => db.getAllGroupMeetings(),
		fetchById: (db, meetingId) => db.getGroupMeetingById(meetingId),
		target: (meeting) => ({
			type: "groupmeeting",
			id: meeting.id,
			groupId: meeting.groupId,
		}),
		createTarget: groupScoped("groupmeeting"),
		createSchema: groupMeetingFields.extend({ groupId: reference }),
		updateSchema: groupMeetingFields.partial(),
		create: (db, values) => db.createGroupMeeting(values),
		update: (db, meetingId, values) => db.updateGroupMeeting(meetingId, values),
		deleteItem: (db, meetingId) => db.deleteGroupMeeting(meetingId),
	}),

	motion: defineEntity({
		type: "motion",
		list: (db) => db.getAllMotions(),
		fetchById: (db, motionId) => db.getMotionById(motionId),
		target: (motion) => ({ type: "motion", id: motion.id, groupId: motion.groupId }),
		createTarget: groupScoped("motion"),
		createSchema: motionFields.extend({ groupId: reference }),
		updateSchema: motionFields.partial(),
		create: (db, values, user) =>
			db.createMotion({ ...values, submittedById: user.id }),
		update: (db, motionId, values) => db.updateMotion(motionId, values),
		deleteItem: (db, motionId) => db.deleteMotion(motionId),
	}),

	inquiry: defineEntity({
		type: "inquiry",
		list: (db) => db.getAllInquiries(),
		fetchById: (db, inquiryId) => db.getInquiryById(inquiryId),
		target: (inquiry) => ({
			type: "inquiry",
			id: inquiry.id,
			groupId: inquiry.groupId,
		}),
		createTarget: groupScoped("inquiry"),
		createSchema: motionFields.extend({ groupId: reference }),
		updateSchema: motionFields.partial(),
		create: (db, values, user) =>
			db.createInquiry({ ...values, submittedById: user.id }),
		update: (db, inquiryId, values) => db.updateInquiry(inquiryId, values),
		deleteItem: (db, inquiryId) => db.deleteInquiry(inquiryId),
	}),

	local: defineEntity({
		type: "local",
		list: (db) => db.getAllLocals(),
		fetchById: (db, localId) => db.getLocalById(localId),
		target: (local) => ({ type: "local", id: local.id }),
		createTarget: () => ({ type: "local" }),
		createSchema: localFields,
		updateSchema: localFields.partial(),
		create: (db, values) => db.createLocal(values),
		update: (db, localId, values) => db.updateLocal(localId, values),
		deleteItem: (db, localId) => db.deleteLocal(localId),
	}),

	council: defineEntity({
		type: "council",
		list: (db) => db.getAllCouncils(),
		fetchById: (db, councilId) => db.getCouncilById(councilId),
		target: (council) => ({
			type: "council",
			id: council.id,
			localId: council.localId,
		}),
		createTarget: (fields) => ({
			type: "council",
			localId: single(fields, "localId"),
		}),
		createSchema: councilFields.extend({ localId: reference }),
		updateSchema: councilFields.partial(),
		create: (db, values) => db.createCouncil(values),
		update: (db, councilId, values) => db.updateCouncil(councilId, values),
		deleteItem: (db, councilId) => db.deleteCouncil(councilId),
	}),

	session: defineEntity({
		type: "session",
		list: (db) => db.getAllSessions(),
		fetchById: (db, sessionId) => db.getSessionById(sessionId),
		target: (session) => ({
			type: "session",
			id: session.id,
			councilId: session.councilId,
			committeeId: session.committeeId,
		}),
		createTarget: (fields) => ({
			type: "session",
			councilId: single(fields, "councilId"),
			committeeId: single(fields, "committeeId") ?? null,
		}),
		createSchema: sessionFields.extend({
			councilId: reference,
			committeeId: nullableId.optional(),
		}),
		updateSchema: sessionFields.partial(),
		create: (db, values) => db.createSession(values),
		update: (db, sessionId, values) => db.updateSession(sessionId, values),
		deleteItem: (db, sessionId) => db.deleteSession(sessionId),
		extend: async (db, sessionId, user) => ({
			excused: await db.hasSessionExcuse(sessionId, user.id),
		}),
	}),

	committee: defineEntity({
		type: "committee",
		list: (db) => db.getAllCommittees(),
		fetchById: (db, committeeId) => db.getCommitteeById(committeeId),
		target: (committee) => ({
			type: "committee",
			id: committee.id,
			councilId: committee.councilId,
		}),
		createTarget: (fields) => ({
			type: "committee",
			councilId: single(fields, "councilId"),
		}),
		createSchema: committeeFields.extend({ councilId: reference }),
		updateSchema: committeeFields.partial(),
		create: (db, values) => db.createCommittee(values),
		update: (db, committeeId, values) =>
			db.updateCommittee(committeeId, values),
		deleteItem: (db, committeeId) => db.deleteCommittee(committeeId),
		extend: async (db, committeeId) => ({
			members: await db.getCommitteeMembers(committeeId),
		}),
	}),

	committeemeeting: defineEntity({
		type: "committeemeeting",
		list: (db) => db.getAllCommitteeMeetings(),
		fetchById: (db, meetingId) => db.getCommitteeMeetingById(meetingId),
		target: (meeting) => ({
			type: "committeemeeting",
			id: meeting.id,
			committeeId: meeting.committeeId,
			councilId: meeting.councilId,
		}),
		createTarget: (fields) => ({
			type: "committeemeeting",
			committeeId: single(fields, "committeeId"),
		}),
		createSchema: committeeMeetingFields.extend({ committeeId: reference }),
		updateSchema: committeeMeetingFields.partial(),
		create: async (db, values) => {
			const meeting = await db.createCommitteeMeeting(values);
			const committee = await db.getCommitteeById(meeting.committeeId);
			return { ...meeting, councilId: committee?.councilId ?? "" };
		},
		update: async (db, meetingId, values) => {
			const meeting = await db.updateCommitteeMeeting(meetingId, values);
			if (!meeting) return null;
			const committee = await db.getCommitteeById(meeting.committeeId);
			return { ...meeting, councilId: committee?.councilId ?? "" };
		},
		deleteItem: (db, meetingId) => db.deleteCommitteeMeeting(meetingId),
	}),
};

/**
 * Collect form values, keeping repeated keys as arrays and skipping files
 */
export function formFields(formData: FormData): FormFields {
	const fields: FormFields = {};
	for (const [key, value] of formData.entries()) {
		if (typeof value !== "string") continue;
		const existing = fields[key];
		if (existing === undefined) {
			fields[key] = value;
		} else if (Array.isArray(existing)) {
			existing.push(value);
		} else {
			fields[key] = [existing, value];
		}
	}
	return fields;
}

export function searchFields(url: URL): FormFields {
	const fields: FormFields = {};
	for (const [key, value] of url.searchParams.entries()) {
		fields[key] = value;
	}
	return fields;
}
