import { redirect } from "react-router";
import { destroySession } from "~/lib/auth.server";
import type { RouteHandler } from "~/lib/router.server";

export const loader: RouteHandler = async () => {
	const sessionCookie = await destroySession();

	return redirect("/", {
		headers: {
			"Set-Cookie": sessionCookie,
		},
	});
};
