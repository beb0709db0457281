import type {
	CalendarFeedToken,
	Committee,
	CommitteeMeeting,
	CommitteeMember,
	Council,
	Group,
	GroupMeeting,
	GroupMember,
	Inquiry,
	Local,
	Motion,
	MotionComment,
	MotionVote,
	NewCommittee,
	NewCommitteeMeeting,
	NewCouncil,
	NewGroup,
	NewGroupMeeting,
	NewGroupMember,
	NewInquiry,
	NewLocal,
	NewMotion,
	NewMotionComment,
	NewMotionVote,
	NewRole,
	NewSession,
	NewUser,
	Party,
	Role,
	Session,
	SessionExcuse,
	StructuralRole,
	User,
} from "../schema";

/**
 * An active group membership together with the Group -> Party -> Local -> Council chain
 */
export interface GroupMembershipRecord {
	membership: GroupMember;
	group: Group;
	party: Party | null;
	local: Local | null;
	council: Council | null;
	roles: StructuralRole[];
}

/** Group member row with the member's structural roles */
export type GroupMemberWithRoles = GroupMember & { roles: StructuralRole[] };

/** Committee meeting joined with the council its committee belongs to */
export type CommitteeMeetingWithCouncil = CommitteeMeeting & {
	councilId: string;
};

export interface CouncilSessionRow {
	session: Session;
	council: Council;
}

export interface CommitteeMeetingRow {
	meeting: CommitteeMeeting;
	committee: Committee;
}

export interface GroupMeetingRow {
	meeting: GroupMeeting;
	group: Group;
}

/**
 * Database adapter interface
 * Implement this interface to support different database backends
 */
export interface DatabaseAdapter {
	// ==================== User Methods ====================
	findUserByEmail(email: string): Promise<User | null>;
	findUserById(id: string): Promise<User | null>;
	getAllUsers(): Promise<User[]>;
	createUser(user: NewUser): Promise<User>;
	updateUser(
		id: string,
		data: Partial<Omit<NewUser, "id">>,
	): Promise<User | null>;
	deleteUser(id: string): Promise<boolean>;

	// ==================== RBAC Methods ====================
	getAllRoles(): Promise<Role[]>;
	getRoleById(id: string): Promise<Role | null>;
	getRoleByName(name: string): Promise<Role | null>;
	createRole(role: NewRole): Promise<Role>;
	updateRole(
		id: string,
		data: Partial<Omit<NewRole, "id">>,
	): Promise<Role | null>;
	deleteRole(id: string): Promise<boolean>;
	/** Number of users whose roleId points at this role */
	countUsersWithRole(roleId: string): Promise<number>;

	// ==================== Membership Methods ====================
	getActiveGroupMembershipsForUser(
		userId: string,
	): Promise<GroupMembershipRecord[]>;
	getActiveLocals(): Promise<Local[]>;
	getActiveCouncils(): Promise<Council[]>;
	/** Committees with an active, non-substitute membership for the user */
	getActiveCommitteeIdsForUser(userId: string): Promise<string[]>;
	/** Committee meetings where the user stands in as a registered substitute */
	getSubstituteMeetingIdsForUser(userId: string): Promise<string[]>;

	// ==================== Political Structure Methods ====================
	getAllLocals(): Promise<Local[]>;
	getLocalById(id: string): Promise<Local | null>;
	createLocal(local: NewLocal): Promise<Local>;
	updateLocal(
		id: string,
		data: Partial<Omit<NewLocal, "id">>,
	): Promise<Local | null>;
	deleteLocal(id: string): Promise<boolean>;

	getAllCouncils(): Promise<Council[]>;
	getCouncilById(id: string): Promise<Council | null>;
	createCouncil(council: NewCouncil): Promise<Council>;
	updateCouncil(
		id: string,
		data: Partial<Omit<NewCouncil, "id">>,
	): Promise<Council | null>;
	deleteCouncil(id: string): Promise<boolean>;

	getAllGroups(): Promise<Group[]>;
	getGroupById(id: string): Promise<Group | null>;
	createGroup(group: NewGroup): Promise<Group>;
	updateGroup(
		id: string,
		data: Partial<Omit<NewGroup, "id">>,
	): Promise<Group | null>;
	deleteGroup(id: string): Promise<boolean>;

	getAllGroupMembers(): Promise<GroupMemberWithRoles[]>;
	getGroupMemberById(id: string): Promise<GroupMemberWithRoles | null>;
	createGroupMember(member: NewGroupMember): Promise<GroupMember>;
	updateGroupMember(
		id: string,
		data: Partial<Omit<NewGroupMember, "id">>,
	): Promise<GroupMember | null>;
	deleteGroupMember(id: string): Promise<boolean>;
	addGroupMemberRole(groupMemberId: string, role: StructuralRole): Promise<void>;
	removeGroupMemberRole(
		groupMemberId: string,
		role: StructuralRole,
	): Promise<void>;
	/** Replace the member's whole set of structural roles */
	setGroupMemberRoles(
		groupMemberId: string,
		roles: StructuralRole[],
	): Promise<void>;

	// ==================== Committee Methods ====================
	getAllCommittees(): Promise<Committee[]>;
	getCommitteeById(id: string): Promise<Committee | null>;
	createCommittee(committee: NewCommittee): Promise<Committee>;
	updateCommittee(
		id: string,
		data: Partial<Omit<NewCommittee, "id">>,
	): Promise<Committee | null>;
	deleteCommittee(id: string): Promise<boolean>;
	getCommitteeMembers(committeeId: string): Promise<CommitteeMember[]>;

	getAllCommitteeMeetings(): Promise<CommitteeMeetingWithCouncil[]>;
	getCommitteeMeetingById(
		id: string,
	): Promise<CommitteeMeetingWithCouncil | null>;
	createCommitteeMeeting(
		meeting: NewCommitteeMeeting,
	): Promise<CommitteeMeeting>;
	updateCommitteeMeeting(
		id: string,
		data: Partial<Omit<NewCommitteeMeeting, "id">>,
	): Promise<CommitteeMeeting | null>;
	deleteCommitteeMeeting(id: string): Promise<boolean>;

	// ==================== Session Methods ====================
	getAllSessions(): Promise<Session[]>;
	getSessionById(id: string): Promise<Session | null>;
	createSession(session: NewSession): Promise<Session>;
	updateSession(
		id: string,
		data: Partial<Omit<NewSession, "id">>,
	): Promise<Session | null>;
	deleteSession(id: string): Promise<boolean>;

	hasSessionExcuse(sessionId: string, userId: string): Promise<boolean>;
	createSessionExcuse(sessionId: string, userId: string): Promise<SessionExcuse>;
	deleteSessionExcuse(sessionId: string, userId: string): Promise<boolean>;

	// ==================== Group Meeting Methods ====================
	getAllGroupMeetings(): Promise<GroupMeeting[]>;
	getGroupMeetingById(id: string): Promise<GroupMeeting | null>;
	createGroupMeeting(meeting: NewGroupMeeting): Promise<GroupMeeting>;
	updateGroupMeeting(
		id: string,
		data: Partial<Omit<NewGroupMeeting, "id">>,
	): Promise<GroupMeeting | null>;
	deleteGroupMeeting(id: string): Promise<boolean>;

	// ==================== Motion & Inquiry Methods ====================
	getAllMotions(): Promise<Motion[]>;
	getMotionById(id: string): Promise<Motion | null>;
	createMotion(motion: NewMotion): Promise<Motion>;
	updateMotion(
		id: string,
		data: Partial<Omit<NewMotion, "id">>,
	): Promise<Motion | null>;
	deleteMotion(id: string): Promise<boolean>;

	/** Votes on a motion, newest first */
	getMotionVotes(motionId: string): Promise<MotionVote[]>;
	/** Record a vote, replacing the voter's earlier vote on the same motion */
	upsertMotionVote(
		vote: NewMotionVote,
	): Promise<{ vote: MotionVote; created: boolean }>;
	/** Comments on a motion, oldest first */
	getMotionComments(motionId: string): Promise<MotionComment[]>;
	createMotionComment(comment: NewMotionComment): Promise<MotionComment>;

	getAllInquiries(): Promise<Inquiry[]>;
	getInquiryById(id: string): Promise<Inquiry | null>;
	createInquiry(inquiry: NewInquiry): Promise<Inquiry>;
	updateInquiry(
		id: string,
		data: Partial<Omit<NewInquiry, "id">>,
	): Promise<Inquiry | null>;
	deleteInquiry(id: string): Promise<boolean>;

	// ==================== Calendar Methods ====================
	/** Active council sessions without a committee, scheduled at or after `from` */
	getCouncilSessionsForCalendar(
		councilIds: string[],
		from: Date,
	): Promise<CouncilSessionRow[]>;
	/** Subset of `sessionIds` the user has excused themselves from */
	getExcusedSessionIds(userId: string, sessionIds: string[]): Promise<string[]>;
	/** Active meetings of the given committees, plus the given meetings */
	getCommitteeMeetingsForCalendar(
		committeeIds: string[],
		meetingIds: string[],
		from: Date,
	): Promise<CommitteeMeetingRow[]>;
	/**
	 * Group meetings of the given groups. With `includeCancelled`, inactive
	 * meetings whose status is cancelled are returned as well.
	 */
	getGroupMeetingsForCalendar(
		groupIds: string[],
		from: Date,
		includeCancelled: boolean,
	): Promise<GroupMeetingRow[]>;

	// ==================== Calendar Feed Token Methods ====================
	findCalendarFeedTokenByHash(
		tokenHash: string,
	): Promise<CalendarFeedToken | null>;
	/** Store a new hash for the user, discarding any previous one */
	replaceCalendarFeedToken(
		userId: string,
		tokenHash: string,
	): Promise<CalendarFeedToken>;
	deleteCalendarFeedToken(userId: string): Promise<boolean>;
}
