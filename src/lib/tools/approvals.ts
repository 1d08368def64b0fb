import { createHash } from "node:crypto";
import type { ModelMessage } from "ai";
import { z } from "zod";
import { ApprovalConflictError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { KeyValueClient } from "../redis.js";
import { normalizeToolName } from "./registry.js";

export type ApprovalRequestPart = {
	approvalId: string;
	toolCallId: string;
	toolName: string;
	toolArguments: Record<string, unknown>;
};

/**
 * One paused agent run per chat. When a single step asked for several
 * approvals, the first is the one being asked; `queued` holds the others
 * and `approvedIds` the ones the user already accepted.
 */
export type PendingApproval = ApprovalRequestPart & {
	chatId: string;
	requestedAt: string;
	messages: ModelMessage[];
	queued?: ApprovalRequestPart[];
	approvedIds?: string[];
};

export type ApprovalStore = {
	set: (pending: PendingApproval) => Promise<void>;
	replace: (pending: PendingApproval) => Promise<void>;
	get: (chatId: string) => Promise<PendingApproval | null>;
	clear: (chatId: string) => Promise<boolean>;
};

export type ApprovalDecision = "approve" | "deny";

export type ApprovalCallback = {
	action: ApprovalDecision;
	token: string;
};

const APPROVAL_KEY_PREFIX = "approval:";

const AFFIRMATIVE_RE =
	/^(y|yes|yep|yeah|approve|approved|ok|okay|sure|confirm|confirmed|go ahead|да)[\s.!]*$/i;

const approvalRequestSchema = z.object({
	approvalId: z.string().min(1),
	toolCallId: z.string().min(1),
	toolName: z.string().min(1),
	toolArguments: z.record(z.string(), z.unknown()),
});

const pendingApprovalSchema = approvalRequestSchema.extend({
	chatId: z.string().min(1),
	requestedAt: z.string(),
	messages: z.array(
		z.custom<ModelMessage>(
			(value) =>
				typeof value === "object" &&
				value !== null &&
				"role" in value &&
				"content" in value,
		),
	),
	queued: z.array(approvalRequestSchema).optional(),
	approvedIds: z.array(z.string().min(1)).optional(),
});

export function toToolArguments(input: unknown): Record<string, unknown> {
	if (!input || typeof input !== "object" || Array.isArray(input)) {
		return input === undefined ? {} : { value: input };
	}
	return Object.fromEntries(Object.entries(input));
}

export function parseApprovalList(raw: string): string[] {
	return raw
		.split(",")
		.map((entry) => entry.trim())
		.filter(Boolean)
		.map((entry) => normalizeToolName(entry));
}

export function parseApprovalDecision(text: string | undefined): ApprovalDecision {
	if (!text) return "deny";
	return AFFIRMATIVE_RE.test(text.trim()) ? "approve" : "deny";
}

export function approvalToken(approvalId: string): string {
	return createHash("sha1").update(approvalId).digest("hex").slice(0, 12);
}

export function buildApprovalCallbackData(
	action: ApprovalDecision,
	approvalId: string,
): string {
	const verb = action === "approve" ? "approve" : "reject";
	return `${verb}:${approvalToken(approvalId)}`;
}

export function parseApprovalCallback(
	data: string | undefined,
): ApprovalCallback | null {
	if (!data) return null;
	const separator = data.indexOf(":");
	if (separator <= 0) return null;
	const verb = data.slice(0, separator);
	const token = data.slice(separator + 1).trim();
	if (!token) return null;
	if (verb === "approve") return { action: "approve", token };
	if (verb === "reject") return { action: "deny", token };
	return null;
}

export function approvalKey(chatId: string): string {
	return `${APPROVAL_KEY_PREFIX}${chatId}`;
}

export function decodePendingApproval(raw: string): PendingApproval | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return null;
	}
	const result = pendingApprovalSchema.safeParse(parsed);
	return result.success ? result.data : null;
}

export function createApprovalStore(
	client: KeyValueClient,
	options: { ttlMs?: number; logger?: Logger } = {},
): ApprovalStore {
	const ttlMs = options.ttlMs ?? 60 * 60 * 1000;
	const logger = options.logger;

	const set = async (pending: PendingApproval) => {
		const stored = await client.setIfAbsent(
			approvalKey(pending.chatId),
			JSON.stringify(pending),
			ttlMs,
		);
		if (!stored) {
			throw new ApprovalConflictError(pending.chatId);
		}
	};

	const replace = async (pending: PendingApproval) => {
		await client.put(
			approvalKey(pending.chatId),
			JSON.stringify(pending),
			ttlMs,
		);
	};

	const get = async (chatId: string) => {
		const raw = await client.get(approvalKey(chatId));
		if (raw === null) return null;
		const pending = decodePendingApproval(raw);
		if (!pending) {
			logger?.warn({ event: "approval_state_invalid", chat_id: chatId });
			await client.delete(approvalKey(chatId));
		}
		return pending;
	};

	const clear = async (chatId: string) => {
		const removed = await client.delete(approvalKey(chatId));
		return removed > 0;
	};

	return { set, replace, get, clear };
}
