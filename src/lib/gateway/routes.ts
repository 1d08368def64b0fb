import { GrammyError } from "grammy";
import { isTelegramUpdate } from "../bot/updates.js";
import { AuthorizationError, formatError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { UpdateQueue } from "../queue/updates-queue.js";
import { allowTelegramUpdate } from "./telegram-allowlist.js";
import { authorizeWebhookRequest } from "./webhook-auth.js";

export const WEBHOOK_PATH = "/telegram/webhook";
export const SET_WEBHOOK_PATH = "/telegram/set-webhook";
export const WEBHOOK_ALLOWED_UPDATES = ["message", "callback_query"] as const;

export type WebhookRegistrar = {
	setWebhook(
		url: string,
		other: {
			secret_token: string;
			allowed_updates: ReadonlyArray<(typeof WEBHOOK_ALLOWED_UPDATES)[number]>;
			drop_pending_updates: boolean;
		},
	): Promise<boolean>;
};

export type RoutesDeps = {
	webhookSecret: string;
	queue: Pick<UpdateQueue, "enqueue">;
	telegram: WebhookRegistrar;
	env: Record<string, string | undefined>;
	publicBaseUrl?: string;
	logger: Logger;
};

function json(body: unknown, status = 200) {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

export function resolveWebhookUrl(request: Request, publicBaseUrl?: string) {
	const base = publicBaseUrl?.trim() || new URL(request.url).origin;
	return `${base.replace(/\/+$/, "")}${WEBHOOK_PATH}`;
}

async function readJson(request: Request): Promise<unknown> {
	try {
		return await request.json();
	} catch {
		return null;
	}
}

export function createRoutes(deps: RoutesDeps) {
	const { logger } = deps;

	async function handleWebhook(request: Request) {
		const auth = authorizeWebhookRequest(request, deps.webhookSecret);
		if (!auth.ok) {
			logger.warn({
				event: "webhook_rejected",
				reason: auth.reason,
				error: new AuthorizationError(auth.reason),
			});
			return json({ ok: false, error: "unauthorized" }, 401);
		}
		const update = await readJson(request);
		if (!isTelegramUpdate(update)) {
			return json({ ok: false, error: "bad_request" }, 400);
		}
		const decision = allowTelegramUpdate(update, deps.env);
		if (!decision.allowed) {
			logger.info({
				event: "gateway_blocked",
				update_id: update.update_id,
				reason: decision.reason ?? "not_allowed",
			});
			return json({ ok: true });
		}
		try {
			const jobId = await deps.queue.enqueue(update);
			logger.info({
				event: "update_routed",
				update_id: update.update_id,
				job_id: jobId,
			});
			return json({ ok: true });
		} catch (error) {
			logger.error({
				event: "enqueue_failed",
				update_id: update.update_id,
				error,
			});
			return json({ ok: false, error: "enqueue_failed" }, 500);
		}
	}

	async function handleSetWebhook(request: Request) {
		const webhookUrl = resolveWebhookUrl(request, deps.publicBaseUrl);
		try {
			const ok = await deps.telegram.setWebhook(webhookUrl, {
				secret_token: deps.webhookSecret,
				allowed_updates: WEBHOOK_ALLOWED_UPDATES,
				drop_pending_updates: true,
			});
			if (!ok) {
				return json(
					{ status: "error", message: "Telegram rejected the webhook" },
					400,
				);
			}
			logger.info({ event: "webhook_registered", webhook_url: webhookUrl });
			return json({
				status: "success",
				webhook_url: webhookUrl,
				secret_token_set: Boolean(deps.webhookSecret),
			});
		} catch (error) {
			logger.error({ event: "webhook_register_failed", error });
			if (error instanceof GrammyError) {
				return json({ status: "error", message: error.description }, 400);
			}
			return json({ status: "error", message: formatError(error) }, 500);
		}
	}

	return async function handle(request: Request): Promise<Response> {
		const url = new URL(request.url);
		if (url.pathname === "/") {
			if (request.method !== "GET") {
				return new Response("Method Not Allowed", { status: 405 });
			}
			return json({ status: "healthy", message: "Service is up and running" });
		}
		if (url.pathname === WEBHOOK_PATH) {
			if (request.method !== "POST") {
				return new Response("Method Not Allowed", { status: 405 });
			}
			return handleWebhook(request);
		}
		if (url.pathname === SET_WEBHOOK_PATH) {
			if (request.method !== "GET") {
				return new Response("Method Not Allowed", { status: 405 });
			}
			return handleSetWebhook(request);
		}
		return new Response("Not found", { status: 404 });
	};
}

export type RequestHandler = ReturnType<typeof createRoutes>;
