import { createCookie, redirect } from "react-router";
import { z } from "zod";
import { type DatabaseAdapter, getDatabase, type Role, type User } from "~/db";
import { can } from "./access/engine";
import { resolveMemberships } from "./access/memberships.server";
import type {
	AccessAction,
	AccessTarget,
	AccessUser,
	ResolvedMemberships,
} from "./access/types";
import type { EntityType } from "~/db/types";
import { SERVER_CONFIG } from "./config.server";
import { forbidden } from "./http.server";
import { parsePermissions } from "./permissions";

// Debug log
console.log("[Auth] Config", {
	sessionSecret: process.env.SESSION_SECRET ? "SET" : "MISSING (dev fallback)",
});

// ============================================
// SESSION COOKIE
// ============================================

const sessionCookie = createCookie("__session", {
	httpOnly: true,
	secure: process.env.NODE_ENV === "production",
	sameSite: "lax",
	path: "/",
	maxAge: 60 * 60 * 24 * 7, // 1 week
	secrets: [SERVER_CONFIG.sessionSecret],
});

const sessionSchema = z.object({ userId: z.string().min(1) });

export type SessionData = z.infer<typeof sessionSchema>;

export async function createSession(userId: string): Promise<string> {
	return sessionCookie.serialize({ userId });
}

export async function getSession(
	request: Request,
): Promise<SessionData | null> {
	const cookieHeader = request.headers.get("Cookie");
	if (!cookieHeader) return null;

	try {
		const parsed = sessionSchema.safeParse(
			await sessionCookie.parse(cookieHeader),
		);
		return parsed.success ? parsed.data : null;
	} catch (error) {
		console.warn("[Auth] Unreadable session cookie:", error);
		return null;
	}
}

export async function destroySession(): Promise<string> {
	return sessionCookie.serialize({}, { maxAge: 0 });
}

// ============================================
// AUTHENTICATED USER
// ============================================

export function toAccessUser(user: User, role: Role | null): AccessUser {
	return {
		id: user.id,
		email: user.email,
		name: user.name,
		isSuperuser: user.isSuperuser,
		language: user.language,
		role: role
			? {
					id: role.id,
					name: role.name,
					isActive: role.isActive,
					permissions: parsePermissions(role.permissions, role.name),
				}
			: null,
	};
}

/**
 * Load an active user and their role into the shape the access engine takes
 */
export async function loadAccessUser(
	db: DatabaseAdapter,
	userId: string,
): Promise<AccessUser | null> {
	const user = await db.findUserById(userId);
	if (!user?.isActive) return null;
	const role = user.roleId ? await db.getRoleById(user.roleId) : null;
	return toAccessUser(user, role);
}

/**
 * Get the signed-in user, or null for anonymous requests
 */
export async function getAuthenticatedUser(
	request: Request,
	db: DatabaseAdapter = getDatabase(),
): Promise<AccessUser | null> {
	const session = await getSession(request);
	if (!session) return null;
	return loadAccessUser(db, session.userId);
}

function loginRedirect(request: Request): Response {
	const url = new URL(request.url);
	const redirectTo = `${url.pathname}${url.search}`;
	return redirect(`/auth/login?redirectTo=${encodeURIComponent(redirectTo)}`);
}

export interface RequestContext {
	db: DatabaseAdapter;
	user: AccessUser;
	memberships: ResolvedMemberships;
}

/**
 * Require a signed-in user. Anonymous requests are redirected to sign-in.
 */
export async function requireUser(
	request: Request,
	db: DatabaseAdapter = getDatabase(),
): Promise<RequestContext> {
	const user = await getAuthenticatedUser(request, db);
	if (!user) {
		throw loginRedirect(request);
	}
	const memberships = await resolveMemberships(db, user);
	return { db, user, memberships };
}

/**
 * Throw a uniform 403 unless the engine allows the action
 */
export function requireAccess(
	context: RequestContext,
	action: AccessAction,
	target: AccessTarget | EntityType,
): void {
	if (can(context.user, context.memberships, action, target)) return;
	const type = typeof target === "string" ? target : target.type;
	console.debug(
		`[Access] Denied ${action} on ${type} for user ${context.user.id}`,
	);
	throw forbidden();
}
