import type { Update } from "grammy/types";
import { vi } from "vitest";
import type {
	AgentCompleteRequest,
	AgentOutcome,
	AgentResumeRequest,
	AgentRuntime,
} from "../../src/lib/agent/runtime.js";
import type { Responder } from "../../src/lib/bot/telegram.js";
import type {
	ConversationStore,
	ConversationTurn,
} from "../../src/lib/context/conversation-store.js";
import { createLogger, type LogLevel } from "../../src/lib/logger.js";
import type { UpdateQueue } from "../../src/lib/queue/updates-queue.js";
import type { KeyValueClient } from "../../src/lib/redis.js";

export type LogRecord = { level: LogLevel } & Record<string, unknown>;

export function createMemoryLogger() {
	const records: LogRecord[] = [];
	const logger = createLogger({ service: "test" }, (level, line) => {
		const parsed: Record<string, unknown> = JSON.parse(line);
		records.push({ ...parsed, level });
	});
	const events = () => records.map((record) => record.event);
	return { logger, records, events };
}

export function createMemoryKeyValue(now: () => number = Date.now) {
	const entries = new Map<string, { value: string; expiresAt: number }>();
	const live = (key: string) => {
		const entry = entries.get(key);
		if (!entry) return null;
		if (entry.expiresAt <= now()) {
			entries.delete(key);
			return null;
		}
		return entry;
	};
	const client: KeyValueClient = {
		get: async (key) => live(key)?.value ?? null,
		setIfAbsent: async (key, value, ttlMs) => {
			if (live(key)) return false;
			entries.set(key, { value, expiresAt: now() + ttlMs });
			return true;
		},
		put: async (key, value, ttlMs) => {
			entries.set(key, { value, expiresAt: now() + ttlMs });
		},
		delete: async (key) => {
			const existed = live(key) !== null;
			entries.delete(key);
			return existed ? 1 : 0;
		},
	};
	return { client, entries };
}

export function createMemoryConversationStore() {
	const turns: ConversationTurn[] = [];
	const store: ConversationStore = {
		append: async (turn) => {
			turns.push(turn);
		},
		load: async (chatId, limit) => {
			if (!chatId || limit <= 0) return [];
			return turns.filter((turn) => turn.chatId === chatId).slice(-limit);
		},
	};
	return { store, turns };
}

export function createFakeRuntime(
	script: {
		complete?: (request: AgentCompleteRequest) => Promise<AgentOutcome>;
		resume?: (request: AgentResumeRequest) => Promise<AgentOutcome>;
	} = {},
) {
	const complete = vi.fn<AgentRuntime["complete"]>(
		script.complete ??
			(async (): Promise<AgentOutcome> => ({
				type: "answer",
				text: "ok",
				toolTurns: [],
			})),
	);
	const resume = vi.fn<AgentRuntime["resume"]>(
		script.resume ??
			(async (): Promise<AgentOutcome> => ({
				type: "answer",
				text: "ok",
				toolTurns: [],
			})),
	);
	const runtime: AgentRuntime = { complete, resume };
	return { runtime, complete, resume };
}

export function createFakeResponder() {
	const sendText = vi.fn<Responder["sendText"]>(async () => undefined);
	const sendApprovalRequest = vi.fn<Responder["sendApprovalRequest"]>(
		async () => undefined,
	);
	const answerCallback = vi.fn<Responder["answerCallback"]>(
		async () => undefined,
	);
	const responder: Responder = { sendText, sendApprovalRequest, answerCallback };
	const texts = (chatId: string) =>
		sendText.mock.calls
			.filter(([target]) => target === chatId)
			.map(([, text]) => text);
	return { responder, sendText, sendApprovalRequest, answerCallback, texts };
}

export function createFakeQueue(options: { fail?: boolean } = {}) {
	const enqueued: Update[] = [];
	const queue: Pick<UpdateQueue, "enqueue"> = {
		enqueue: async (update) => {
			if (options.fail) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
			enqueued.push(update);
			return String(enqueued.length);
		},
	};
	return { queue, enqueued };
}

let nextUpdateId = 1;

export function textUpdate(
	text: string,
	options: { chatId?: number; userId?: number; isBot?: boolean } = {},
): Update {
	const chatId = options.chatId ?? 42;
	return {
		update_id: nextUpdateId++,
		message: {
			message_id: nextUpdateId,
			date: 0,
			from: {
				id: options.userId ?? chatId,
				is_bot: options.isBot ?? false,
				first_name: "Alice",
			},
			chat: { id: chatId, type: "private", first_name: "Alice" },
			text,
		},
	};
}

export function callbackUpdate(data: string, chatId = 42): Update {
	return {
		update_id: nextUpdateId++,
		callback_query: {
			id: `cb-${nextUpdateId}`,
			from: { id: chatId, is_bot: false, first_name: "Alice" },
			chat_instance: "instance-1",
			data,
			message: {
				message_id: 7,
				date: 0,
				chat: { id: chatId, type: "private", first_name: "Alice" },
				text: "Confirmation required",
			},
		},
	};
}
