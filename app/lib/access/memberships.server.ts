import type { Council, DatabaseAdapter, Local, StructuralRole } from "~/db";
import type {
	AccessUser,
	GroupAccessEntry,
	ResolvedMemberships,
} from "./types";

export const LEADER_ROLES: readonly StructuralRole[] = [
	"leader",
	"deputy_leader",
];

function byName<T extends { name: string }>(a: T, b: T): number {
	if (a.name === b.name) return 0;
	return a.name < b.name ? -1 : 1;
}

function uniqueById<T extends { id: string }>(items: T[]): T[] {
	const seen = new Map<string, T>();
	for (const item of items) {
		if (!seen.has(item.id)) seen.set(item.id, item);
	}
	return [...seen.values()];
}

/**
 * Resolve everything the access engine and the calendar need to know about
 * a user's memberships. Reads only.
 */
export async function resolveMemberships(
	db: DatabaseAdapter,
	user: AccessUser,
): Promise<ResolvedMemberships> {
	const [groupMemberships, committeeIds, substituteMeetingIds] =
		await Promise.all([
			db.getActiveGroupMembershipsForUser(user.id),
			db.getActiveCommitteeIdsForUser(user.id),
			db.getSubstituteMeetingIdsForUser(user.id),
		]);

	const entries: GroupAccessEntry[] = groupMemberships.map((record) => ({
		group: record.group,
		roles: record.roles,
		isLeader: record.roles.some((role) => LEADER_ROLES.includes(role)),
		isAdmin: record.roles.includes("group_admin"),
	}));
	const leaderGroups = entries.filter((entry) => entry.isLeader);
	const adminGroups = entries.filter((entry) => entry.isAdmin);

	// Leader entries come first so they win the dedupe
	const allGroups: GroupAccessEntry[] = [];
	const seenGroups = new Set<string>();
	for (const entry of [...leaderGroups, ...adminGroups]) {
		if (seenGroups.has(entry.group.id)) continue;
		seenGroups.add(entry.group.id);
		allGroups.push(entry);
	}

	let locals: Local[];
	let councils: Council[];
	if (user.isSuperuser) {
		[locals, councils] = await Promise.all([
			db.getActiveLocals(),
			db.getActiveCouncils(),
		]);
	} else {
		const reachableLocals: Local[] = [];
		const reachableCouncils: Council[] = [];
		for (const record of groupMemberships) {
			if (!record.party || !record.local) continue;
			reachableLocals.push(record.local);
			if (record.council) reachableCouncils.push(record.council);
		}
		locals = uniqueById(reachableLocals);
		councils = uniqueById(reachableCouncils);
	}

	return {
		groupMemberships,
		leaderGroups,
		adminGroups,
		allGroups,
		locals: [...locals].sort(byName),
		councils: [...councils].sort(byName),
		committeeIds,
		substituteMeetingIds,
	};
}
