import { InlineKeyboard } from "grammy";
import { describe, expect, it, vi } from "vitest";
import {
	createTelegramFiles,
	createTelegramResponder,
	formatApprovalRequest,
	getRetryAfterMs,
	splitText,
	type TelegramApi,
} from "../src/lib/bot/telegram.js";
import { DeliveryError } from "../src/lib/errors.js";
import type { PendingApproval } from "../src/lib/tools/approvals.js";

function fakeApi() {
	const sendMessage = vi.fn<TelegramApi["sendMessage"]>(async () => ({}));
	const answerCallbackQuery = vi.fn<TelegramApi["answerCallbackQuery"]>(
		async () => true,
	);
	const getFile = vi.fn<TelegramApi["getFile"]>(async () => ({
		file_path: "photos/file_1.jpg",
	}));
	const api: TelegramApi = { sendMessage, answerCallbackQuery, getFile };
	return { api, sendMessage, answerCallbackQuery, getFile };
}

function responderFor(api: TelegramApi, textChunkLimit = 4000) {
	const logDebug = vi.fn();
	const sleep = vi.fn(async (_ms: number) => undefined);
	const responder = createTelegramResponder({
		api,
		textChunkLimit,
		logDebug,
		sleep,
		retry: { jitter: 0 },
	});
	return { responder, logDebug, sleep };
}

const pending: PendingApproval = {
	chatId: "42",
	approvalId: "approval-1",
	toolCallId: "call-1",
	toolName: "get_weather",
	toolArguments: { location: "Paris" },
	requestedAt: "2026-01-20T00:00:00.000Z",
	messages: [],
};

describe("splitText", () => {
	it("splits long text at the chunk limit", () => {
		expect(splitText("abcdefg", 3)).toEqual(["abc", "def", "g"]);
		expect(splitText("abc", 3)).toEqual(["abc"]);
		expect(splitText("abc", 0)).toEqual(["abc"]);
	});
});

describe("getRetryAfterMs", () => {
	it("reads retry_after from Telegram errors", () => {
		expect(getRetryAfterMs({ parameters: { retry_after: 2 } })).toBe(2000);
		expect(getRetryAfterMs({ error: { parameters: { retry_after: 1 } } })).toBe(
			1000,
		);
		expect(getRetryAfterMs(new Error("boom"))).toBeNull();
	});
});

describe("telegram responder", () => {
	it("sends long replies in chunks", async () => {
		const { api, sendMessage } = fakeApi();
		const { responder } = responderFor(api, 5);

		await responder.sendText("42", "hello world");

		expect(sendMessage.mock.calls.map(([, text]) => text)).toEqual([
			"hello",
			" worl",
			"d",
		]);
	});

	it("retries transient sendMessage failures with backoff", async () => {
		const { api, sendMessage } = fakeApi();
		sendMessage
			.mockRejectedValueOnce(new Error("Network request for 'sendMessage' failed!"))
			.mockRejectedValueOnce(new Error("Network request for 'sendMessage' failed!"));
		const { responder, logDebug, sleep } = responderFor(api);

		await responder.sendText("42", "hello");

		expect(sendMessage).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([400, 800]);
		expect(logDebug).toHaveBeenCalledWith(
			"telegram send retry",
			expect.objectContaining({ label: "sendMessage", attempt: 1 }),
		);
		expect(logDebug).toHaveBeenCalledWith(
			"telegram send retry",
			expect.objectContaining({ label: "sendMessage", attempt: 2 }),
		);
	});

	it("waits for retry_after on rate limits", async () => {
		const { api, sendMessage } = fakeApi();
		sendMessage.mockRejectedValueOnce(
			Object.assign(new Error("429: Too Many Requests"), {
				parameters: { retry_after: 3 },
			}),
		);
		const { responder, sleep } = responderFor(api);

		await responder.sendText("42", "hello");

		expect(sleep).toHaveBeenCalledWith(3000);
	});

	it("does not retry permanent failures", async () => {
		const { api, sendMessage } = fakeApi();
		sendMessage.mockRejectedValue(new Error("Forbidden: bot was blocked by the user"));
		const { responder, sleep } = responderFor(api);

		const error = await responder.sendText("42", "hello").catch((e: unknown) => e);

		expect(error).toBeInstanceOf(DeliveryError);
		expect(sendMessage).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("raises a delivery error after exhausting retries", async () => {
		const { api, sendMessage } = fakeApi();
		sendMessage.mockRejectedValue(new Error("ETIMEDOUT: timeout"));
		const { responder } = responderFor(api);

		await expect(responder.sendText("42", "hello")).rejects.toBeInstanceOf(
			DeliveryError,
		);
		expect(sendMessage).toHaveBeenCalledTimes(3);
	});

	it("sends approval requests with an inline keyboard", async () => {
		const { api, sendMessage } = fakeApi();
		const { responder } = responderFor(api);

		await responder.sendApprovalRequest("42", pending);

		const [chatId, text, other] = sendMessage.mock.calls[0] ?? [];
		expect(chatId).toBe("42");
		expect(text).toBe(formatApprovalRequest(pending));
		const keyboard = other?.reply_markup;
		expect(keyboard).toBeInstanceOf(InlineKeyboard);
		expect(keyboard?.inline_keyboard[0]?.map((button) => button.text)).toEqual([
			"✅ Approve",
			"❌ Reject",
		]);
	});

	it("answers callback queries", async () => {
		const { api, answerCallbackQuery } = fakeApi();
		const { responder } = responderFor(api);

		await responder.answerCallback("cb-1", "This approval has expired");

		expect(answerCallbackQuery).toHaveBeenCalledWith("cb-1", {
			text: "This approval has expired",
		});
	});
});

describe("formatApprovalRequest", () => {
	it("names the tool and its arguments", () => {
		expect(formatApprovalRequest(pending)).toBe(
			[
				"⚠️ Confirmation required",
				"",
				"The assistant wants to run get_weather with:",
				'{\n  "location": "Paris"\n}',
				"",
				'Reply "yes" to approve. Anything else cancels it.',
			].join("\n"),
		);
	});
});

describe("createTelegramFiles", () => {
	it("builds download urls", async () => {
		const { api, getFile } = fakeApi();
		const files = createTelegramFiles(api, "test-token");
		expect(await files.getFileUrl("file-1")).toBe(
			"https://api.telegram.org/file/bottest-token/photos/file_1.jpg",
		);
		expect(getFile).toHaveBeenCalledWith("file-1");
	});

	it("fails when Telegram returns no path", async () => {
		const { api, getFile } = fakeApi();
		getFile.mockResolvedValueOnce({});
		const files = createTelegramFiles(api, "test-token");
		await expect(files.getFileUrl("file-1")).rejects.toThrow(
			"Telegram returned no file path for file-1",
		);
	});
});
