import type { Message, Update } from "grammy/types";

export type Sender = {
	userId?: string;
	firstName?: string;
	isBot: boolean;
};

export type InboundText = Sender & {
	kind: "text";
	chatId: string;
	text: string;
};

export type InboundMedia = Sender & {
	kind: "media";
	chatId: string;
	mediaType: "image" | "file";
	fileId: string;
	mimeType?: string;
	fileName?: string;
	caption?: string;
};

export type InboundCallback = Sender & {
	kind: "callback";
	chatId: string;
	callbackQueryId: string;
	data?: string;
};

export type InboundUpdate = InboundText | InboundMedia | InboundCallback;

export function isTelegramUpdate(value: unknown): value is Update {
	return (
		typeof value === "object" &&
		value !== null &&
		"update_id" in value &&
		typeof value.update_id === "number"
	);
}

function resolveMessage(update: Update): Message | undefined {
	return update.message ?? update.edited_message;
}

export function getUpdateChatId(update: Update): string {
	const message = resolveMessage(update);
	if (message?.chat?.id !== undefined) return String(message.chat.id);
	const callbackChat = update.callback_query?.message?.chat?.id;
	if (callbackChat !== undefined) return String(callbackChat);
	return "";
}

export function getUpdateSender(update: Update): Sender | null {
	const from = resolveMessage(update)?.from ?? update.callback_query?.from;
	if (!from) return null;
	return {
		userId: String(from.id),
		firstName: from.first_name || undefined,
		isBot: from.is_bot === true,
	};
}

export function getUpdateType(
	update: Update,
): "message" | "edited_message" | "callback_query" | "other" {
	if (update.message) return "message";
	if (update.edited_message) return "edited_message";
	if (update.callback_query) return "callback_query";
	return "other";
}

export function parseInboundUpdate(update: Update): InboundUpdate | null {
	const chatId = getUpdateChatId(update);
	if (!chatId) return null;
	const sender = getUpdateSender(update) ?? { isBot: false };

	const callback = update.callback_query;
	if (callback) {
		return {
			kind: "callback",
			chatId,
			callbackQueryId: callback.id,
			data: callback.data,
			...sender,
		};
	}

	const message = resolveMessage(update);
	if (!message) return null;

	const photo = message.photo;
	if (photo && photo.length > 0) {
		const largest = photo[photo.length - 1];
		if (largest) {
			return {
				kind: "media",
				chatId,
				mediaType: "image",
				fileId: largest.file_id,
				mimeType: "image/jpeg",
				caption: message.caption,
				...sender,
			};
		}
	}

	const document = message.document;
	if (document) {
		return {
			kind: "media",
			chatId,
			mediaType: document.mime_type?.startsWith("image/") ? "image" : "file",
			fileId: document.file_id,
			mimeType: document.mime_type,
			fileName: document.file_name,
			caption: message.caption,
			...sender,
		};
	}

	if (typeof message.text === "string") {
		return { kind: "text", chatId, text: message.text, ...sender };
	}
	return null;
}

export function parseCommand(text: string): string | null {
	const trimmed = text.trim();
	if (!trimmed.startsWith("/")) return null;
	const [head] = trimmed.split(/\s+/, 1);
	if (!head) return null;
	const [command] = head.slice(1).split("@", 1);
	return command ? command.toLowerCase() : null;
}
