import {
	type ActionFunctionArgs,
	createStaticHandler,
	isRouteErrorResponse,
	matchRoutes,
	type RouteObject,
} from "react-router";
import { methodNotAllowed } from "./http.server";

export type RouteArgs = Pick<ActionFunctionArgs, "request" | "params">;

export type RouteHandler = (args: RouteArgs) => Promise<Response>;

/**
 * A resource route: `loader` answers GET and HEAD, `action` everything else
 */
export interface RouteModule {
	loader?: RouteHandler;
	action?: RouteHandler;
}

export function resourceRoute(path: string, module: RouteModule): RouteObject {
	return { path, loader: module.loader, action: module.action };
}

function allowedMethods(routes: RouteObject[], pathname: string): string[] {
	const matches = matchRoutes(routes, pathname);
	const target = matches?.[matches.length - 1]?.route;
	const methods: string[] = [];
	if (target?.loader) methods.push("GET", "HEAD");
	if (target?.action) methods.push("POST");
	return methods;
}

/**
 * Serve resource routes through react-router's static handler.
 * Loaders and actions end a request early by throwing a Response; anything
 * else thrown becomes a 500.
 */
export function createFetchHandler(
	routes: RouteObject[],
): (request: Request) => Promise<Response> {
	const handler = createStaticHandler(routes);

	return async function handleRequest(request: Request): Promise<Response> {
		const { pathname } = new URL(request.url);
		try {
			const result = await handler.queryRoute(request);
			return result instanceof Response ? result : Response.json(result);
		} catch (error) {
			if (error instanceof Response) {
				return error;
			}
			if (isRouteErrorResponse(error)) {
				// A GET to a route without a loader comes back as a 400
				const allowed = allowedMethods(routes, pathname);
				if (
					error.status === 405 ||
					(error.status === 400 && !allowed.includes(request.method))
				) {
					return methodNotAllowed(allowed);
				}
				return new Response(error.statusText, { status: error.status });
			}
			console.error(`[Server] ${request.method} ${pathname} failed:`, error);
			return new Response("Internal Server Error", { status: 500 });
		}
	};
}
