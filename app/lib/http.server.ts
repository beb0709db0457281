/**
 * Responses thrown from loaders and actions to end a request early.
 * Bodies stay generic so a denial never says which rule failed.
 */

export function forbidden(): Response {
	return new Response("Forbidden", { status: 403 });
}

export function notFound(): Response {
	return new Response("Not Found", { status: 404 });
}

export function badRequest(
	error: string,
	details: Record<string, unknown> = {},
): Response {
	return Response.json({ error, ...details }, { status: 400 });
}

export function methodNotAllowed(allow: string[]): Response {
	return new Response(JSON.stringify({ error: "Method not allowed" }), {
		status: 405,
		headers: {
			"Content-Type": "application/json",
			Allow: allow.join(", "),
		},
	});
}

/**
 * Host and origin as the client addressed them
 */
export function requestOrigin(request: Request): { host: string; origin: string } {
	const url = new URL(request.url);
	return { host: url.host, origin: url.origin };
}
