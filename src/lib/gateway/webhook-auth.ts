import { timingSafeEqual } from "node:crypto";

export const TELEGRAM_SECRET_HEADER = "X-Telegram-Bot-Api-Secret-Token";

export type WebhookAuthResult =
	| { ok: true }
	| { ok: false; reason: "secret_missing" | "secret_invalid" };

function safeEqual(a: string, b: string) {
	const left = Buffer.from(a, "utf8");
	const right = Buffer.from(b, "utf8");
	if (left.length !== right.length) return false;
	return timingSafeEqual(left, right);
}

export function authorizeWebhookRequest(
	request: Pick<Request, "headers">,
	secret: string,
): WebhookAuthResult {
	const provided = request.headers.get(TELEGRAM_SECRET_HEADER);
	if (!provided) return { ok: false, reason: "secret_missing" };
	if (!secret || !safeEqual(provided, secret)) {
		return { ok: false, reason: "secret_invalid" };
	}
	return { ok: true };
}
