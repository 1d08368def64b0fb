import { describe, expect, it } from "vitest";
import { allowTelegramUpdate } from "../src/lib/gateway/telegram-allowlist.js";
import {
	authorizeWebhookRequest,
	TELEGRAM_SECRET_HEADER,
} from "../src/lib/gateway/webhook-auth.js";
import { callbackUpdate, textUpdate } from "./support/fakes.js";

function withSecret(value?: string) {
	const headers = new Headers();
	if (value !== undefined) headers.set(TELEGRAM_SECRET_HEADER, value);
	return { headers };
}

describe("authorizeWebhookRequest", () => {
	it("accepts the configured secret", () => {
		expect(authorizeWebhookRequest(withSecret("test-secret"), "test-secret")).toEqual({
			ok: true,
		});
	});

	it("reads the header case-insensitively", () => {
		const headers = new Headers({
			"x-telegram-bot-api-secret-token": "test-secret",
		});
		expect(authorizeWebhookRequest({ headers }, "test-secret").ok).toBe(true);
	});

	it("rejects a missing header", () => {
		expect(authorizeWebhookRequest(withSecret(), "test-secret")).toEqual({
			ok: false,
			reason: "secret_missing",
		});
	});

	it("rejects a different secret of any length", () => {
		expect(authorizeWebhookRequest(withSecret("test-secreT"), "test-secret")).toEqual({
			ok: false,
			reason: "secret_invalid",
		});
		expect(authorizeWebhookRequest(withSecret("short"), "test-secret")).toEqual({
			ok: false,
			reason: "secret_invalid",
		});
	});

	it("rejects everything when no secret is configured", () => {
		expect(authorizeWebhookRequest(withSecret("anything"), "").ok).toBe(false);
	});
});

describe("gateway telegram allowlist", () => {
	it("allows when no allowlist configured", () => {
		expect(allowTelegramUpdate(textUpdate("hi", { userId: 1 }), {})).toEqual({
			allowed: true,
		});
	});

	it("denies when user not in allowlist", () => {
		const decision = allowTelegramUpdate(textUpdate("hi", { userId: 2 }), {
			ALLOWED_TG_IDS: "1, 3",
		});
		expect(decision).toEqual({ allowed: false, reason: "user_not_allowed" });
	});

	it("allows listed users, including on callbacks", () => {
		expect(
			allowTelegramUpdate(textUpdate("hi", { userId: 3 }), {
				ALLOWED_TG_IDS: "1,3",
			}).allowed,
		).toBe(true);
		expect(
			allowTelegramUpdate(callbackUpdate("approve:x", 1), {
				ALLOWED_TG_IDS: "1",
			}).allowed,
		).toBe(true);
	});

	it("drops messages sent by bots", () => {
		expect(allowTelegramUpdate(textUpdate("hi", { isBot: true }), {})).toEqual({
			allowed: false,
			reason: "bot_sender",
		});
	});

	it("drops updates without a chat", () => {
		expect(allowTelegramUpdate({ update_id: 1 }, {})).toEqual({
			allowed: false,
			reason: "no_chat",
		});
	});
});
