import type { Update } from "grammy/types";
import { getUpdateChatId, getUpdateSender } from "../bot/updates.js";

export type AllowlistDecision = { allowed: boolean; reason?: string };

function parseSet(raw: string | undefined) {
	if (!raw) return new Set<string>();
	return new Set(
		raw
			.split(",")
			.map((entry) => entry.trim())
			.filter(Boolean),
	);
}

export function allowTelegramUpdate(
	update: Update,
	env: Record<string, string | undefined>,
): AllowlistDecision {
	if (!getUpdateChatId(update)) {
		return { allowed: false, reason: "no_chat" };
	}
	const sender = getUpdateSender(update);
	if (sender?.isBot) {
		return { allowed: false, reason: "bot_sender" };
	}
	const allowedUsers = parseSet(env.ALLOWED_TG_IDS);
	if (allowedUsers.size > 0 && !allowedUsers.has(sender?.userId ?? "")) {
		return { allowed: false, reason: "user_not_allowed" };
	}
	return { allowed: true };
}
