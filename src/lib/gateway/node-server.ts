import http from "node:http";
import type { Logger } from "../logger.js";
import type { RequestHandler } from "./routes.js";

const MAX_BODY_BYTES = 1024 * 1024;

async function readBody(req: http.IncomingMessage): Promise<Buffer> {
	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of req) {
		const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buffer.length;
		if (size > MAX_BODY_BYTES) {
			throw new Error("payload too large");
		}
		chunks.push(buffer);
	}
	return Buffer.concat(chunks);
}

export async function toFetchRequest(
	req: http.IncomingMessage,
): Promise<Request> {
	const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
	const headers = new Headers();
	for (const [key, value] of Object.entries(req.headers)) {
		if (value === undefined) continue;
		headers.set(key, Array.isArray(value) ? value.join(", ") : value);
	}
	const method = req.method ?? "GET";
	const body =
		method === "GET" || method === "HEAD" ? undefined : await readBody(req);
	return new Request(url, { method, headers, body });
}

async function writeResponse(res: http.ServerResponse, response: Response) {
	const headers: Record<string, string> = {};
	response.headers.forEach((value, key) => {
		headers[key] = value;
	});
	res.writeHead(response.status, headers);
	res.end(Buffer.from(await response.arrayBuffer()));
}

export function createNodeServer(handler: RequestHandler, logger: Logger) {
	return http.createServer((req, res) => {
		void (async () => {
			try {
				const request = await toFetchRequest(req);
				await writeResponse(res, await handler(request));
			} catch (error) {
				logger.error({ event: "http_request_failed", path: req.url, error });
				if (!res.headersSent) {
					res.writeHead(500, { "Content-Type": "application/json" });
				}
				res.end(JSON.stringify({ ok: false, error: "internal_error" }));
			}
		})();
	});
}

export function listen(
	server: http.Server,
	host: string,
	port: number,
): Promise<void> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(port, host, () => {
			server.off("error", reject);
			resolve();
		});
	});
}
