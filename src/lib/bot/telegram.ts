import { InlineKeyboard } from "grammy";
import { DeliveryError, formatError } from "../errors.js";
import {
	buildApprovalCallbackData,
	type PendingApproval,
} from "../tools/approvals.js";

/**
 * The slice of grammY's `Api` the responder needs. `bot.api` or `new Api()`
 * satisfies it; tests pass a plain object.
 */
export type TelegramApi = {
	sendMessage(
		chatId: string,
		text: string,
		other?: { reply_markup?: InlineKeyboard },
	): Promise<unknown>;
	answerCallbackQuery(
		callbackQueryId: string,
		other?: { text?: string },
	): Promise<unknown>;
	getFile(fileId: string): Promise<{ file_path?: string }>;
};

export type Responder = {
	sendText: (chatId: string, text: string) => Promise<void>;
	sendApprovalRequest: (
		chatId: string,
		pending: PendingApproval,
	) => Promise<void>;
	answerCallback: (callbackQueryId: string, text: string) => Promise<void>;
};

export type TelegramFiles = {
	getFileUrl: (fileId: string) => Promise<string>;
};

type RetryConfig = {
	attempts: number;
	minDelayMs: number;
	maxDelayMs: number;
	jitter: number;
};

export type TelegramResponderOptions = {
	api: TelegramApi;
	textChunkLimit: number;
	logDebug: (message: string, data?: Record<string, unknown>) => void;
	retry?: Partial<RetryConfig>;
	sleep?: (ms: number) => Promise<void>;
};

const TELEGRAM_RETRY_DEFAULTS: RetryConfig = {
	attempts: 3,
	minDelayMs: 400,
	maxDelayMs: 30_000,
	jitter: 0.1,
};

const TELEGRAM_RETRY_RE =
	/429|timeout|timed out|connect|reset|closed|unavailable|temporarily|network request/i;

function readRetryAfter(source: unknown): unknown {
	if (!source || typeof source !== "object") return undefined;
	if (!("parameters" in source)) return undefined;
	const parameters = source.parameters;
	if (!parameters || typeof parameters !== "object") return undefined;
	return "retry_after" in parameters ? parameters.retry_after : undefined;
}

export function getRetryAfterMs(error: unknown): number | null {
	if (!error || typeof error !== "object") return null;
	const candidate =
		readRetryAfter(error) ??
		("response" in error ? readRetryAfter(error.response) : undefined) ??
		("error" in error ? readRetryAfter(error.error) : undefined);
	return typeof candidate === "number" && Number.isFinite(candidate)
		? candidate * 1000
		: null;
}

export function splitText(text: string, limit: number): string[] {
	const size = Number.isFinite(limit) && limit > 0 ? limit : 4000;
	if (text.length <= size) return [text];
	const chunks: string[] = [];
	for (let i = 0; i < text.length; i += size) {
		chunks.push(text.slice(i, i + size));
	}
	return chunks;
}

export function formatApprovalRequest(pending: PendingApproval): string {
	const args = JSON.stringify(pending.toolArguments, null, 2);
	return [
		"⚠️ Confirmation required",
		"",
		`The assistant wants to run ${pending.toolName} with:`,
		args,
		"",
		'Reply "yes" to approve. Anything else cancels it.',
	].join("\n");
}

const defaultSleep = (ms: number) =>
	new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createTelegramResponder(
	options: TelegramResponderOptions,
): Responder {
	const { api, textChunkLimit, logDebug } = options;
	const retry = { ...TELEGRAM_RETRY_DEFAULTS, ...options.retry };
	const sleep = options.sleep ?? defaultSleep;

	async function retryTelegram<T>(
		fn: () => Promise<T>,
		label: string,
	): Promise<T> {
		let lastError: unknown = null;
		for (let attempt = 1; attempt <= retry.attempts; attempt += 1) {
			try {
				return await fn();
			} catch (error) {
				lastError = error;
				const errorText = formatError(error);
				const shouldRetry = TELEGRAM_RETRY_RE.test(errorText);
				if (!shouldRetry || attempt >= retry.attempts) {
					throw error;
				}
				const retryAfterMs = getRetryAfterMs(error);
				const baseDelay =
					retryAfterMs ??
					Math.min(retry.minDelayMs * 2 ** (attempt - 1), retry.maxDelayMs);
				const delayMs = Math.max(
					0,
					Math.round(baseDelay * (1 + (Math.random() * 2 - 1) * retry.jitter)),
				);
				logDebug("telegram send retry", {
					label,
					attempt,
					delayMs,
					error: errorText,
				});
				await sleep(delayMs);
			}
		}
		throw lastError ?? new Error("telegram send failed");
	}

	async function sendText(chatId: string, text: string) {
		try {
			for (const chunk of splitText(text, textChunkLimit)) {
				await retryTelegram(
					() => api.sendMessage(chatId, chunk),
					"sendMessage",
				);
			}
		} catch (error) {
			throw new DeliveryError(chatId, error);
		}
	}

	async function sendApprovalRequest(chatId: string, pending: PendingApproval) {
		const keyboard = new InlineKeyboard()
			.text("✅ Approve", buildApprovalCallbackData("approve", pending.approvalId))
			.text("❌ Reject", buildApprovalCallbackData("deny", pending.approvalId));
		try {
			await retryTelegram(
				() =>
					api.sendMessage(chatId, formatApprovalRequest(pending), {
						reply_markup: keyboard,
					}),
				"sendApprovalRequest",
			);
		} catch (error) {
			throw new DeliveryError(chatId, error);
		}
	}

	async function answerCallback(callbackQueryId: string, text: string) {
		try {
			await retryTelegram(
				() => api.answerCallbackQuery(callbackQueryId, { text }),
				"answerCallbackQuery",
			);
		} catch (error) {
			throw new DeliveryError(`callback:${callbackQueryId}`, error);
		}
	}

	return { sendText, sendApprovalRequest, answerCallback };
}

export function createTelegramFiles(
	api: Pick<TelegramApi, "getFile">,
	botToken: string,
): TelegramFiles {
	return {
		getFileUrl: async (fileId) => {
			const file = await api.getFile(fileId);
			if (!file.file_path) {
				throw new Error(`Telegram returned no file path for ${fileId}`);
			}
			return `https://api.telegram.org/file/bot${botToken}/${file.file_path}`;
		},
	};
}
