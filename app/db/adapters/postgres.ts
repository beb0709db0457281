import {
	and,
	asc,
	count,
	desc,
	eq,
	getTableColumns,
	gte,
	inArray,
	isNull,
	ne,
	or,
	type SQL,
} from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import {
	type CalendarFeedToken,
	type Committee,
	type CommitteeMeeting,
	type CommitteeMember,
	type Council,
	calendarFeedTokens,
	committeeMeetings,
	committeeMembers,
	committeeParticipationSubstitutes,
	committees,
	councils,
	type Group,
	type GroupMeeting,
	type GroupMember,
	groupMeetings,
	groupMemberRoles,
	groupMembers,
	groups,
	type Inquiry,
	inquiries,
	type Local,
	locals,
	type Motion,
	type MotionComment,
	type MotionVote,
	motionComments,
	motions,
	motionVotes,
	type NewCommittee,
	type NewCommitteeMeeting,
	type NewCouncil,
	type NewGroup,
	type NewGroupMeeting,
	type NewGroupMember,
	type NewInquiry,
	type NewLocal,
	type NewMotion,
	type NewMotionComment,
	type NewMotionVote,
	type NewRole,
	type NewSession,
	type NewUser,
	parties,
	type Role,
	roles,
	type Session,
	type SessionExcuse,
	type StructuralRole,
	sessionExcuses,
	sessions,
	type User,
	users,
} from "../schema";
import type {
	CommitteeMeetingRow,
	CommitteeMeetingWithCouncil,
	CouncilSessionRow,
	DatabaseAdapter,
	GroupMeetingRow,
	GroupMemberWithRoles,
	GroupMembershipRecord,
} from "./types";

/**
 * Standard PostgreSQL database adapter using Drizzle ORM
 * For local development with Docker or any standard Postgres instance
 */
export class PostgresAdapter implements DatabaseAdapter {
	private db: ReturnType<typeof drizzle>;

	constructor(connectionString: string) {
		const client = postgres(connectionString);
		this.db = drizzle(client);
	}

	// ==================== User Methods ====================
	async findUserByEmail(email: string): Promise<User | null> {
		const result = await this.db
			.select()
			.from(users)
			.where(eq(users.email, email.toLowerCase()))
			.limit(1);
		return result[0] ?? null;
	}

	async findUserById(id: string): Promise<User | null> {
		const result = await this.db
			.select()
			.from(users)
			.where(eq(users.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async getAllUsers(): Promise<User[]> {
		return this.db
			.select()
			.from(users)
			.orderBy(asc(users.name), asc(users.createdAt));
	}

	async createUser(user: NewUser): Promise<User> {
		const result = await this.db
			.insert(users)
			.values({ ...user, email: user.email.toLowerCase() })
			.returning();
		return result[0];
	}

	async updateUser(
		id: string,
		data: Partial<Omit<NewUser, "id">>,
	): Promise<User | null> {
		const result = await this.db
			.update(users)
			.set({ ...data, email: data.email?.toLowerCase(), updatedAt: new Date() })
			.where(eq(users.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteUser(id: string): Promise<boolean> {
		const result = await this.db
			.delete(users)
			.where(eq(users.id, id))
			.returning();
		return result.length > 0;
	}

	// ==================== RBAC Methods ====================
	async getAllRoles(): Promise<Role[]> {
		return this.db.select().from(roles).orderBy(asc(roles.name));
	}

	async getRoleById(id: string): Promise<Role | null> {
		const result = await this.db
			.select()
			.from(roles)
			.where(eq(roles.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async getRoleByName(name: string): Promise<Role | null> {
		const result = await this.db
			.select()
			.from(roles)
			.where(eq(roles.name, name))
			.limit(1);
		return result[0] ?? null;
	}

	async createRole(role: NewRole): Promise<Role> {
		const result = await this.db.insert(roles).values(role).returning();
		return result[0];
	}

	async updateRole(
		id: string,
		data: Partial<Omit<NewRole, "id">>,
	): Promise<Role | null> {
		const result = await this.db
			.update(roles)
			.set({ ...data, updatedAt: new Date() })
			.where(eq(roles.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteRole(id: string): Promise<boolean> {
		const result = await this.db
			.delete(roles)
			.where(eq(roles.id, id))
			.returning();
		return result.length > 0;
	}

	async countUsersWithRole(roleId: string): Promise<number> {
		const result = await this.db
			.select({ value: count() })
			.from(users)
			.where(eq(users.roleId, roleId));
		return result[0]?.value ?? 0;
	}

	// ==================== Membership Methods ====================
	async getActiveGroupMembershipsForUser(
		userId: string,
	): Promise<GroupMembershipRecord[]> {
		const rows = await this.db
			.select({
				membership: groupMembers,
				group: groups,
				party: parties,
				local: locals,
				council: councils,
			})
			.from(groupMembers)
			.innerJoin(groups, eq(groupMembers.groupId, groups.id))
			.leftJoin(parties, eq(groups.partyId, parties.id))
			.leftJoin(locals, eq(parties.localId, locals.id))
			.leftJoin(councils, eq(councils.localId, locals.id))
			.where(
				and(eq(groupMembers.userId, userId), eq(groupMembers.isActive, true)),
			)
			.orderBy(asc(groups.name));

		const rolesByMember = await this.getRolesForMembers(
			rows.map((row) => row.membership.id),
		);
		return rows.map((row) => ({
			...row,
			roles: rolesByMember.get(row.membership.id) ?? [],
		}));
	}

	async getActiveLocals(): Promise<Local[]> {
		return this.db
			.select()
			.from(locals)
			.where(eq(locals.isActive, true))
			.orderBy(asc(locals.name));
	}

	async getActiveCouncils(): Promise<Council[]> {
		return this.db
			.select()
			.from(councils)
			.where(eq(councils.isActive, true))
			.orderBy(asc(councils.name));
	}

	async getActiveCommitteeIdsForUser(userId: string): Promise<string[]> {
		// Substitute members only attend the meetings they are registered for
		const rows = await this.db
			.selectDistinct({ committeeId: committeeMembers.committeeId })
			.from(committeeMembers)
			.where(
				and(
					eq(committeeMembers.userId, userId),
					eq(committeeMembers.isActive, true),
					ne(committeeMembers.role, "substitute_member"),
				),
			);
		return rows.map((row) => row.committeeId);
	}

	async getSubstituteMeetingIdsForUser(userId: string): Promise<string[]> {
		const rows = await this.db
			.selectDistinct({
				meetingId: committeeParticipationSubstitutes.committeeMeetingId,
			})
			.from(committeeParticipationSubstitutes)
			.innerJoin(
				committeeMembers,
				eq(
					committeeParticipationSubstitutes.substituteMemberId,
					committeeMembers.id,
				),
			)
			.where(eq(committeeMembers.userId, userId));
		return rows.map((row) => row.meetingId);
	}

	// ==================== Political Structure Methods ====================
	async getAllLocals(): Promise<Local[]> {
		return this.db.select().from(locals).orderBy(asc(locals.name));
	}

	async getLocalById(id: string): Promise<Local | null> {
		const result = await this.db
			.select()
			.from(locals)
			.where(eq(locals.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createLocal(local: NewLocal): Promise<Local> {
		const result = await this.db.insert(locals).values(local).returning();
		return result[0];
	}

	async updateLocal(
		id: string,
		data: Partial<Omit<NewLocal, "id">>,
	): Promise<Local | null> {
		const result = await this.db
			.update(locals)
			.set(data)
			.where(eq(locals.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteLocal(id: string): Promise<boolean> {
		const result = await this.db
			.delete(locals)
			.where(eq(locals.id, id))
			.returning();
		return result.length > 0;
	}

	async getAllCouncils(): Promise<Council[]> {
		return this.db.select().from(councils).orderBy(asc(councils.name));
	}

	async getCouncilById(id: string): Promise<Council | null> {
		const result = await this.db
			.select()
			.from(councils)
			.where(eq(councils.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createCouncil(council: NewCouncil): Promise<Council> {
		const result = await this.db.insert(councils).values(council).returning();
		return result[0];
	}

	async updateCouncil(
		id: string,
		data: Partial<Omit<NewCouncil, "id">>,
	): Promise<Council | null> {
		const result = await this.db
			.update(councils)
			.set(data)
			.where(eq(councils.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteCouncil(id: string): Promise<boolean> {
		const result = await this.db
			.delete(councils)
			.where(eq(councils.id, id))
			.returning();
		return result.length > 0;
	}

	async getAllGroups(): Promise<Group[]> {
		return this.db.select().from(groups).orderBy(asc(groups.name));
	}

	async getGroupById(id: string): Promise<Group | null> {
		const result = await this.db
			.select()
			.from(groups)
			.where(eq(groups.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createGroup(group: NewGroup): Promise<Group> {
		const result = await this.db.insert(groups).values(group).returning();
		return result[0];
	}

	async updateGroup(
		id: string,
		data: Partial<Omit<NewGroup, "id">>,
	): Promise<Group | null> {
		const result = await this.db
			.update(groups)
			.set(data)
			.where(eq(groups.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteGroup(id: string): Promise<boolean> {
		const result = await this.db
			.delete(groups)
			.where(eq(groups.id, id))
			.returning();
		return result.length > 0;
	}

	private async getRolesForMembers(
		memberIds: string[],
	): Promise<Map<string, StructuralRole[]>> {
		const byMember = new Map<string, StructuralRole[]>();
		if (memberIds.length === 0) return byMember;
		const rows = await this.db
			.select()
			.from(groupMemberRoles)
			.where(inArray(groupMemberRoles.groupMemberId, memberIds));
		for (const row of rows) {
			const list = byMember.get(row.groupMemberId) ?? [];
			list.push(row.role);
			byMember.set(row.groupMemberId, list);
		}
		return byMember;
	}

	async getAllGroupMembers(): Promise<GroupMemberWithRoles[]> {
		const members = await this.db
			.select()
			.from(groupMembers)
			.orderBy(asc(groupMembers.createdAt));
		const rolesByMember = await this.getRolesForMembers(
			members.map((m) => m.id),
		);
		return members.map((m) => ({ ...m, roles: rolesByMember.get(m.id) ?? [] }));
	}

	async getGroupMemberById(id: string): Promise<GroupMemberWithRoles | null> {
		const result = await this.db
			.select()
			.from(groupMembers)
			.where(eq(groupMembers.id, id))
			.limit(1);
		const member = result[0];
		if (!member) return null;
		const rolesByMember = await this.getRolesForMembers([member.id]);
		return { ...member, roles: rolesByMember.get(member.id) ?? [] };
	}

	async createGroupMember(member: NewGroupMember): Promise<GroupMember> {
		const result = await this.db
			.insert(groupMembers)
			.values(member)
			.returning();
		return result[0];
	}

	async updateGroupMember(
		id: string,
		data: Partial<Omit<NewGroupMember, "id">>,
	): Promise<GroupMember | null> {
		const result = await this.db
			.update(groupMembers)
			.set(data)
			.where(eq(groupMembers.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteGroupMember(id: string): Promise<boolean> {
		const result = await this.db
			.delete(groupMembers)
			.where(eq(groupMembers.id, id))
			.returning();
		return result.length > 0;
	}

	async addGroupMemberRole(
		groupMemberId: string,
		role: StructuralRole,
	): Promise<void> {
		await this.db
			.insert(groupMemberRoles)
			.values({ groupMemberId, role })
			.onConflictDoNothing();
	}

	async removeGroupMemberRole(
		groupMemberId: string,
		role: StructuralRole,
	): Promise<void> {
		await this.db
			.delete(groupMemberRoles)
			.where(
				and(
					eq(groupMemberRoles.groupMemberId, groupMemberId),
					eq(groupMemberRoles.role, role),
				),
			);
	}

	async setGroupMemberRoles(
		groupMemberId: string,
		roles: StructuralRole[],
	): Promise<void> {
		await this.db.transaction(async (tx) => {
			await tx
				.delete(groupMemberRoles)
				.where(eq(groupMemberRoles.groupMemberId, groupMemberId));
			if (roles.length > 0) {
				await tx
					.insert(groupMemberRoles)
					.values(roles.map((role) => ({ groupMemberId, role })));
			}
		});
	}

	// ==================== Committee Methods ====================
	async getAllCommittees(): Promise<Committee[]> {
		return this.db.select().from(committees).orderBy(asc(committees.name));
	}

	async getCommitteeById(id: string): Promise<Committee | null> {
		const result = await this.db
			.select()
			.from(committees)
			.where(eq(committees.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createCommittee(committee: NewCommittee): Promise<Committee> {
		const result = await this.db
			.insert(committees)
			.values(committee)
			.returning();
		return result[0];
	}

	async updateCommittee(
		id: string,
		data: Partial<Omit<NewCommittee, "id">>,
	): Promise<Committee | null> {
		const result = await this.db
			.update(committees)
			.set(data)
			.where(eq(committees.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteCommittee(id: string): Promise<boolean> {
		const result = await this.db
			.delete(committees)
			.where(eq(committees.id, id))
			.returning();
		return result.length > 0;
	}

	async getCommitteeMembers(committeeId: string): Promise<CommitteeMember[]> {
		return this.db
			.select()
			.from(committeeMembers)
			.where(eq(committeeMembers.committeeId, committeeId))
			.orderBy(asc(committeeMembers.createdAt));
	}

	private selectCommitteeMeetingsWithCouncil() {
		return this.db
			.select({
				...getTableColumns(committeeMeetings),
				councilId: committees.councilId,
			})
			.from(committeeMeetings)
			.innerJoin(committees, eq(committeeMeetings.committeeId, committees.id));
	}

	async getAllCommitteeMeetings(): Promise<CommitteeMeetingWithCouncil[]> {
		return this.selectCommitteeMeetingsWithCouncil().orderBy(
			asc(committeeMeetings.scheduledDate),
		);
	}

	async getCommitteeMeetingById(
		id: string,
	): Promise<CommitteeMeetingWithCouncil | null> {
		const result = await this.selectCommitteeMeetingsWithCouncil()
			.where(eq(committeeMeetings.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createCommitteeMeeting(
		meeting: NewCommitteeMeeting,
	): Promise<CommitteeMeeting> {
		const result = await this.db
			.insert(committeeMeetings)
			.values(meeting)
			.returning();
		return result[0];
	}

	async updateCommitteeMeeting(
		id: string,
		data: Partial<Omit<NewCommitteeMeeting, "id">>,
	): Promise<CommitteeMeeting | null> {
		const result = await this.db
			.update(committeeMeetings)
			.set(data)
			.where(eq(committeeMeetings.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteCommitteeMeeting(id: string): Promise<boolean> {
		const result = await this.db
			.delete(committeeMeetings)
			.where(eq(committeeMeetings.id, id))
			.returning();
		return result.length > 0;
	}

	// ==================== Session Methods ====================
	async getAllSessions(): Promise<Session[]> {
		return this.db.select().from(sessions).orderBy(asc(sessions.scheduledDate));
	}

	async getSessionById(id: string): Promise<Session | null> {
		const result = await this.db
			.select()
			.from(sessions)
			.where(eq(sessions.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createSession(session: NewSession): Promise<Session> {
		const result = await this.db.insert(sessions).values(session).returning();
		return result[0];
	}

	async updateSession(
		id: string,
		data: Partial<Omit<NewSession, "id">>,
	): Promise<Session | null> {
		const result = await this.db
			.update(sessions)
			.set(data)
			.where(eq(sessions.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteSession(id: string): Promise<boolean> {
		const result = await this.db
			.delete(sessions)
			.where(eq(sessions.id, id))
			.returning();
		return result.length > 0;
	}

	async hasSessionExcuse(sessionId: string, userId: string): Promise<boolean> {
		const result = await this.db
			.select({ id: sessionExcuses.id })
			.from(sessionExcuses)
			.where(
				and(
					eq(sessionExcuses.sessionId, sessionId),
					eq(sessionExcuses.userId, userId),
				),
			)
			.limit(1);
		return result.length > 0;
	}

	async createSessionExcuse(
		sessionId: string,
		userId: string,
	): Promise<SessionExcuse> {
		const result = await this.db
			.insert(sessionExcuses)
			.values({ sessionId, userId })
			.onConflictDoUpdate({
				target: [sessionExcuses.sessionId, sessionExcuses.userId],
				set: { sessionId },
			})
			.returning();
		return result[0];
	}

	async deleteSessionExcuse(
		sessionId: string,
		userId: string,
	): Promise<boolean> {
		const result = await this.db
			.delete(sessionExcuses)
			.where(
				and(
					eq(sessionExcuses.sessionId, sessionId),
					eq(sessionExcuses.userId, userId),
				),
			)
			.returning();
		return result.length > 0;
	}

	// ==================== Group Meeting Methods ====================
	async getAllGroupMeetings(): Promise<GroupMeeting[]> {
		return this.db
			.select()
			.from(groupMeetings)
			.orderBy(asc(groupMeetings.scheduledDate));
	}

	async getGroupMeetingById(id: string): Promise<GroupMeeting | null> {
		const result = await this.db
			.select()
			.from(groupMeetings)
			.where(eq(groupMeetings.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createGroupMeeting(meeting: NewGroupMeeting): Promise<GroupMeeting> {
		const result = await this.db
			.insert(groupMeetings)
			.values(meeting)
			.returning();
		return result[0];
	}

	async updateGroupMeeting(
		id: string,
		data: Partial<Omit<NewGroupMeeting, "id">>,
	): Promise<GroupMeeting | null> {
		const result = await this.db
			.update(groupMeetings)
			.set(data)
			.where(eq(groupMeetings.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteGroupMeeting(id: string): Promise<boolean> {
		const result = await this.db
			.delete(groupMeetings)
			.where(eq(groupMeetings.id, id))
			.returning();
		return result.length > 0;
	}

	// ==================== Motion & Inquiry Methods ====================
	async getAllMotions(): Promise<Motion[]> {
		return this.db.select().from(motions).orderBy(asc(motions.createdAt));
	}

	async getMotionById(id: string): Promise<Motion | null> {
		const result = await this.db
			.select()
			.from(motions)
			.where(eq(motions.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createMotion(motion: NewMotion): Promise<Motion> {
		const result = await this.db.insert(motions).values(motion).returning();
		return result[0];
	}

	async updateMotion(
		id: string,
		data: Partial<Omit<NewMotion, "id">>,
	): Promise<Motion | null> {
		const result = await this.db
			.update(motions)
			.set(data)
			.where(eq(motions.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteMotion(id: string): Promise<boolean> {
		const result = await this.db
			.delete(motions)
			.where(eq(motions.id, id))
			.returning();
		return result.length > 0;
	}

	async getMotionVotes(motionId: string): Promise<MotionVote[]> {
		return this.db
			.select()
			.from(motionVotes)
			.where(eq(motionVotes.motionId, motionId))
			.orderBy(desc(motionVotes.votedAt));
	}

	async upsertMotionVote(
		vote: NewMotionVote,
	): Promise<{ vote: MotionVote; created: boolean }> {
		const existing = await this.db
			.select({ id: motionVotes.id })
			.from(motionVotes)
			.where(
				and(
					eq(motionVotes.motionId, vote.motionId),
					eq(motionVotes.voterId, vote.voterId),
				),
			)
			.limit(1);
		const result = await this.db
			.insert(motionVotes)
			.values(vote)
			.onConflictDoUpdate({
				target: [motionVotes.motionId, motionVotes.voterId],
				set: { vote: vote.vote, reason: vote.reason ?? "", votedAt: new Date() },
			})
			.returning();
		return { vote: result[0], created: existing.length === 0 };
	}

	async getMotionComments(motionId: string): Promise<MotionComment[]> {
		return this.db
			.select()
			.from(motionComments)
			.where(eq(motionComments.motionId, motionId))
			.orderBy(asc(motionComments.createdAt));
	}

	async createMotionComment(
		comment: NewMotionComment,
	): Promise<MotionComment> {
		const result = await this.db
			.insert(motionComments)
			.values(comment)
			.returning();
		return result[0];
	}

	async getAllInquiries(): Promise<Inquiry[]> {
		return this.db.select().from(inquiries).orderBy(asc(inquiries.createdAt));
	}

	async getInquiryById(id: string): Promise<Inquiry | null> {
		const result = await this.db
			.select()
			.from(inquiries)
			.where(eq(inquiries.id, id))
			.limit(1);
		return result[0] ?? null;
	}

	async createInquiry(inquiry: NewInquiry): Promise<Inquiry> {
		const result = await this.db.insert(inquiries).values(inquiry).returning();
		return result[0];
	}

	async updateInquiry(
		id: string,
		data: Partial<Omit<NewInquiry, "id">>,
	): Promise<Inquiry | null> {
		const result = await this.db
			.update(inquiries)
			.set(data)
			.where(eq(inquiries.id, id))
			.returning();
		return result[0] ?? null;
	}

	async deleteInquiry(id: string): Promise<boolean> {
		const result = await this.db
			.delete(inquiries)
			.where(eq(inquiries.id, id))
			.returning();
		return result.length > 0;
	}

	// ==================== Calendar Methods ====================
	async getCouncilSessionsForCalendar(
		councilIds: string[],
		from: Date,
	): Promise<CouncilSessionRow[]> {
		if (councilIds.length === 0) return [];
		return this.db
			.select({ session: sessions, council: councils })
			.from(sessions)
			.innerJoin(councils, eq(sessions.councilId, councils.id))
			.where(
				and(
					inArray(sessions.councilId, councilIds),
					isNull(sessions.committeeId),
					eq(sessions.isActive, true),
					gte(sessions.scheduledDate, from),
				),
			)
			.orderBy(asc(sessions.scheduledDate));
	}

	async getExcusedSessionIds(
		userId: string,
		sessionIds: string[],
	): Promise<string[]> {
		if (sessionIds.length === 0) return [];
		const rows = await this.db
			.select({ sessionId: sessionExcuses.sessionId })
			.from(sessionExcuses)
			.where(
				and(
					eq(sessionExcuses.userId, userId),
					inArray(sessionExcuses.sessionId, sessionIds),
				),
			);
		return rows.map((row) => row.sessionId);
	}

	async getCommitteeMeetingsForCalendar(
		committeeIds: string[],
		meetingIds: string[],
		from: Date,
	): Promise<CommitteeMeetingRow[]> {
		const scopes: SQL[] = [];
		if (committeeIds.length > 0) {
			scopes.push(inArray(committeeMeetings.committeeId, committeeIds));
		}
		if (meetingIds.length > 0) {
			scopes.push(inArray(committeeMeetings.id, meetingIds));
		}
		if (scopes.length === 0) return [];
		return this.db
			.select({ meeting: committeeMeetings, committee: committees })
			.from(committeeMeetings)
			.innerJoin(committees, eq(committeeMeetings.committeeId, committees.id))
			.where(
				and(
					eq(committeeMeetings.isActive, true),
					gte(committeeMeetings.scheduledDate, from),
					or(...scopes),
				),
			)
			.orderBy(asc(committeeMeetings.scheduledDate));
	}

	async getGroupMeetingsForCalendar(
		groupIds: string[],
		from: Date,
		includeCancelled: boolean,
	): Promise<GroupMeetingRow[]> {
		if (groupIds.length === 0) return [];
		const visible = includeCancelled
			? or(
					eq(groupMeetings.isActive, true),
					eq(groupMeetings.status, "cancelled"),
				)
			: eq(groupMeetings.isActive, true);
		return this.db
			.select({ meeting: groupMeetings, group: groups })
			.from(groupMeetings)
			.innerJoin(groups, eq(groupMeetings.groupId, groups.id))
			.where(
				and(
					inArray(groupMeetings.groupId, groupIds),
					gte(groupMeetings.scheduledDate, from),
					visible,
				),
			)
			.orderBy(asc(groupMeetings.scheduledDate));
	}

	// ==================== Calendar Feed Token Methods ====================
	async findCalendarFeedTokenByHash(
		tokenHash: string,
	): Promise<CalendarFeedToken | null> {
		const result = await this.db
			.select()
			.from(calendarFeedTokens)
			.where(eq(calendarFeedTokens.tokenHash, tokenHash))
			.limit(1);
		return result[0] ?? null;
	}

	async replaceCalendarFeedToken(
		userId: string,
		tokenHash: string,
	): Promise<CalendarFeedToken> {
		const result = await this.db
			.insert(calendarFeedTokens)
			.values({ userId, tokenHash })
			.onConflictDoUpdate({
				target: calendarFeedTokens.userId,
				set: { tokenHash, createdAt: new Date() },
			})
			.returning();
		return result[0];
	}

	async deleteCalendarFeedToken(userId: string): Promise<boolean> {
		const result = await this.db
			.delete(calendarFeedTokens)
			.where(eq(calendarFeedTokens.userId, userId))
			.returning();
		return result.length > 0;
	}
}
