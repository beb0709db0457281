import type { User } from "~/db";
import { createSession } from "~/lib/auth.server";
import { createFetchHandler } from "~/lib/router.server";
import routes from "~/routes";

export const ORIGIN = "http://portal.example.test";

const handle = createFetchHandler(routes);

export interface TestRequestOptions {
	user?: User;
	method?: string;
	form?: Record<string, string | string[]>;
}

/** Cookie header value carrying a signed session for the user */
export async function sessionCookieFor(user: User): Promise<string> {
	const setCookie = await createSession(user.id);
	return setCookie.split(";")[0];
}

/**
 * Send a request through the app's route table
 */
export async function send(
	path: string,
	{ user, method, form }: TestRequestOptions = {},
): Promise<Response> {
	const headers = new Headers();
	if (user) {
		headers.set("Cookie", await sessionCookieFor(user));
	}
	return handle(
		new Request(`${ORIGIN}${path}`, {
			method: method ?? (form ? "POST" : "GET"),
			headers,
			body: form ? formBody(form) : undefined,
		}),
	);
}

/** Repeated fields are sent once per value, as a form with checkboxes would */
function formBody(form: Record<string, string | string[]>): URLSearchParams {
	const body = new URLSearchParams();
	for (const [key, value] of Object.entries(form)) {
		for (const item of Array.isArray(value) ? value : [value]) {
			body.append(key, item);
		}
	}
	return body;
}

export function icsLines(body: string): string[] {
	return body.split("\r\n");
}
