import {
	createReadableStreamFromReadable,
	writeReadableStreamToWritable,
} from "@react-router/node";
import express from "express";
import { SERVER_CONFIG } from "~/lib/config.server";
import { getConfigSummary } from "~/lib/env-config.server";
import { createFetchHandler } from "~/lib/router.server";
import routes from "./routes";

const handleRequest = createFetchHandler(routes);

function toRequest(req: express.Request, res: express.Response): Request {
	const url = new URL(req.originalUrl, `${req.protocol}://${req.get("host") ?? "localhost"}`);

	const controller = new AbortController();
	res.on("close", () => controller.abort());

	const headers = new Headers();
	for (const [key, value] of Object.entries(req.headers)) {
		if (value === undefined) continue;
		if (Array.isArray(value)) {
			for (const item of value) headers.append(key, item);
		} else {
			headers.set(key, value);
		}
	}

	const init: RequestInit & { duplex?: "half" } = {
		method: req.method,
		headers,
		signal: controller.signal,
	};
	if (req.method !== "GET" && req.method !== "HEAD") {
		init.body = createReadableStreamFromReadable(req);
		init.duplex = "half";
	}
	return new Request(url, init);
}

async function sendResponse(res: express.Response, response: Response): Promise<void> {
	res.status(response.status);
	response.headers.forEach((value, key) => {
		if (key !== "set-cookie") res.append(key, value);
	});
	const cookies = response.headers.getSetCookie();
	if (cookies.length > 0) res.append("Set-Cookie", cookies);

	if (response.body && res.req.method !== "HEAD") {
		await writeReadableStreamToWritable(response.body, res);
	} else {
		res.end();
	}
}

const app = express();
app.disable("x-powered-by");

app.use((req, res, next) => {
	handleRequest(toRequest(req, res))
		.then((response) => sendResponse(res, response))
		.catch(next);
});

console.log(`[Server] ${getConfigSummary()}`);
app.listen(SERVER_CONFIG.port, () => {
	console.log(`[Server] Listening on http://localhost:${SERVER_CONFIG.port}`);
});
