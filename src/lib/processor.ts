import type { ModelMessage, UserContent } from "ai";
import type { Update } from "grammy/types";
import { type InputGuardrail, refusalMessage } from "./agent/guardrail.js";
import type { AgentOutcome, AgentRuntime } from "./agent/runtime.js";
import type { Responder, TelegramFiles } from "./bot/telegram.js";
import {
	getUpdateType,
	type InboundCallback,
	type InboundMedia,
	type InboundUpdate,
	parseCommand,
	parseInboundUpdate,
} from "./bot/updates.js";
import type {
	ConversationRole,
	ConversationStore,
} from "./context/conversation-store.js";
import {
	createTurn,
	formatToolTurn,
	historyToModelMessages,
} from "./context/session-history.js";
import { DeliveryError, ProcessingError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createToolStatusHandler } from "./tool-status.js";
import {
	type ApprovalDecision,
	type ApprovalStore,
	approvalToken,
	type PendingApproval,
	parseApprovalCallback,
	parseApprovalDecision,
} from "./tools/approvals.js";

export const GENERIC_ERROR_MESSAGE =
	"Sorry, something went wrong. Please try again later.";
export const GREETING_MESSAGE =
	"Hi! I can look up the current weather anywhere. Ask me something like “What's the weather in Paris?”";
export const APPROVAL_EXPIRED_MESSAGE = "This approval has expired";
export const NOTHING_TO_CANCEL_MESSAGE = "There is nothing to cancel.";
export const PENDING_CANCELLED_MESSAGE = "The pending action was cancelled.";
export const IMAGE_FAILED_MESSAGE =
	"Sorry, I couldn't process that image. Please try again or send a different image.";
export const DOCUMENT_FAILED_MESSAGE =
	"Sorry, I couldn't process that document. Please try again or send a different file.";

export function cancelledMessage(toolName: string): string {
	return `❌ Action cancelled: ${toolName} was not run.`;
}

export type UpdateProcessorDeps = {
	runtime: AgentRuntime;
	conversations: ConversationStore;
	approvals: ApprovalStore;
	responder: Responder;
	files?: TelegramFiles;
	guardrail?: InputGuardrail;
	historyLimit: number;
	logger: Logger;
	toolStatusDelayMs?: number;
	now?: () => Date;
};

export type UpdateProcessor = {
	process: (update: Update) => Promise<void>;
};

function describeMedia(inbound: InboundMedia): string {
	const label =
		inbound.mediaType === "image"
			? "[image]"
			: `[file${inbound.fileName ? `: ${inbound.fileName}` : ""}]`;
	return inbound.caption ? `${inbound.caption}\n${label}` : label;
}

export function createUpdateProcessor(
	deps: UpdateProcessorDeps,
): UpdateProcessor {
	const { runtime, conversations, approvals, responder, logger } = deps;
	const now = deps.now ?? (() => new Date());

	async function deliver(chatId: string, send: () => Promise<void>) {
		try {
			await send();
		} catch (error) {
			if (!(error instanceof DeliveryError)) throw error;
			logger.error({
				event: "delivery_failed",
				chat_id: chatId,
				error,
			});
		}
	}

	const sendText = (chatId: string, text: string) =>
		deliver(chatId, () => responder.sendText(chatId, text));

	const answerCallback = (inbound: InboundCallback, text: string) =>
		deliver(inbound.chatId, () =>
			responder.answerCallback(inbound.callbackQueryId, text),
		);

	const append = (chatId: string, role: ConversationRole, content: string) =>
		conversations.append(createTurn(chatId, role, content, now()));

	async function appendToolTurns(chatId: string, outcome: AgentOutcome) {
		for (const turn of outcome.toolTurns) {
			await append(chatId, "tool", formatToolTurn(turn.toolName, turn.output));
		}
	}

	async function buildUserContent(
		inbound: InboundUpdate,
	): Promise<UserContent> {
		if (inbound.kind === "text") return inbound.text;
		if (inbound.kind !== "media" || !deps.files) return "";
		const url = new URL(await deps.files.getFileUrl(inbound.fileId));
		const text = inbound.caption?.trim() || "What is in this attachment?";
		if (inbound.mediaType === "image") {
			return [
				{ type: "text", text },
				{ type: "image", image: url, mediaType: inbound.mimeType },
			];
		}
		return [
			{ type: "text", text },
			{
				type: "file",
				data: url,
				mediaType: inbound.mimeType ?? "application/octet-stream",
				filename: inbound.fileName,
			},
		];
	}

	async function resolveUserContent(
		inbound: InboundUpdate,
	): Promise<UserContent | null> {
		try {
			return await buildUserContent(inbound);
		} catch (error) {
			if (inbound.kind !== "media") throw error;
			logger.warn({
				event: "media_fetch_failed",
				chat_id: inbound.chatId,
				media_type: inbound.mediaType,
				error: error instanceof Error ? error : String(error),
			});
			await sendText(
				inbound.chatId,
				inbound.mediaType === "image"
					? IMAGE_FAILED_MESSAGE
					: DOCUMENT_FAILED_MESSAGE,
			);
			return null;
		}
	}

	function toPendingApproval(
		chatId: string,
		outcome: Extract<AgentOutcome, { type: "approval" }>,
	): PendingApproval {
		return {
			chatId,
			approvalId: outcome.approvalId,
			toolCallId: outcome.toolCallId,
			toolName: outcome.toolName,
			toolArguments: outcome.toolArguments,
			requestedAt: now().toISOString(),
			messages: outcome.messages,
			queued: outcome.queued,
			approvedIds: [],
		};
	}

	/** Moves to the next request of the same step without calling the model. */
	function advanceApproval(pending: PendingApproval): PendingApproval | null {
		const [next, ...rest] = pending.queued ?? [];
		if (!next) return null;
		return {
			...pending,
			...next,
			requestedAt: now().toISOString(),
			queued: rest,
			approvedIds: [...(pending.approvedIds ?? []), pending.approvalId],
		};
	}

	async function announceApproval(pending: PendingApproval, nested: boolean) {
		logger.info({
			event: "approval_requested",
			chat_id: pending.chatId,
			tool: pending.toolName,
			approval_id: pending.approvalId,
			nested,
		});
		await deliver(pending.chatId, () =>
			responder.sendApprovalRequest(pending.chatId, pending),
		);
	}

	async function handleQuery(inbound: InboundUpdate, userText: string) {
		const { chatId } = inbound;
		const content = await resolveUserContent(inbound);
		if (content === null) return;
		const userMessage: ModelMessage = { role: "user", content };
		if (deps.guardrail) {
			const verdict = await deps.guardrail.check([userMessage]);
			if (!verdict.is_weather) {
				logger.info({
					event: "guardrail_tripped",
					chat_id: chatId,
					reasoning: verdict.reasoning,
				});
				await sendText(chatId, refusalMessage(inbound.firstName));
				return;
			}
		}
		const history = await conversations.load(chatId, deps.historyLimit);
		const status = createToolStatusHandler(
			(message) => sendText(chatId, message),
			{ delayMs: deps.toolStatusDelayMs },
		);
		let outcome: AgentOutcome;
		try {
			outcome = await runtime.complete({
				chatId,
				messages: [...historyToModelMessages(history), userMessage],
				userName: inbound.firstName,
				onToolStep: status.onToolStep,
			});
		} finally {
			status.clearAllStatuses();
		}

		if (outcome.type === "approval") {
			const pending = toPendingApproval(chatId, outcome);
			await approvals.set(pending);
			await append(chatId, "user", userText);
			await appendToolTurns(chatId, outcome);
			await announceApproval(pending, false);
			return;
		}

		await append(chatId, "user", userText);
		await appendToolTurns(chatId, outcome);
		await append(chatId, "assistant", outcome.text);
		logger.info({
			event: "agent_answer",
			chat_id: chatId,
			tool_turns: outcome.toolTurns.length,
		});
		await sendText(chatId, outcome.text);
	}

	async function handleDecision(
		inbound: InboundUpdate,
		pending: PendingApproval,
		decision: ApprovalDecision,
		decisionText: string,
	) {
		const { chatId } = inbound;
		logger.info({
			event: "approval_decided",
			chat_id: chatId,
			tool: pending.toolName,
			approval_id: pending.approvalId,
			decision,
		});

		if (decision === "deny") {
			await approvals.clear(chatId);
			await append(chatId, "user", decisionText);
			const reply = cancelledMessage(pending.toolName);
			await append(chatId, "assistant", reply);
			await sendText(chatId, reply);
			return;
		}

		const next = advanceApproval(pending);
		if (next) {
			await approvals.replace(next);
			await announceApproval(next, false);
			return;
		}

		const status = createToolStatusHandler(
			(message) => sendText(chatId, message),
			{ delayMs: deps.toolStatusDelayMs },
		);
		let outcome: AgentOutcome;
		try {
			outcome = await runtime.resume({
				chatId,
				pending,
				approved: true,
				userName: inbound.firstName,
				onToolStep: status.onToolStep,
			});
		} catch (error) {
			// Back to Idle when the resumed run fails.
			await approvals.clear(chatId);
			throw error;
		} finally {
			status.clearAllStatuses();
		}

		await appendToolTurns(chatId, outcome);
		if (outcome.type === "approval") {
			const next = toPendingApproval(chatId, outcome);
			await approvals.replace(next);
			await announceApproval(next, true);
			return;
		}
		await append(chatId, "assistant", outcome.text);
		await approvals.clear(chatId);
		logger.info({
			event: "agent_answer",
			chat_id: chatId,
			tool_turns: outcome.toolTurns.length,
			resumed: true,
		});
		await sendText(chatId, outcome.text);
	}

	async function handleCallback(
		inbound: InboundCallback,
		pending: PendingApproval | null,
	) {
		const callback = parseApprovalCallback(inbound.data);
		if (
			!pending ||
			!callback ||
			callback.token !== approvalToken(pending.approvalId)
		) {
			await answerCallback(inbound, APPROVAL_EXPIRED_MESSAGE);
			return;
		}
		await answerCallback(
			inbound,
			callback.action === "approve" ? "✅ Approved" : "❌ Rejected",
		);
		await handleDecision(
			inbound,
			pending,
			callback.action,
			callback.action === "approve" ? "[approved]" : "[rejected]",
		);
	}

	async function handleCommand(
		inbound: InboundUpdate,
		command: string,
	): Promise<boolean> {
		if (command === "start") {
			await sendText(inbound.chatId, GREETING_MESSAGE);
			return true;
		}
		if (command === "cancel") {
			const cleared = await approvals.clear(inbound.chatId);
			await sendText(
				inbound.chatId,
				cleared ? PENDING_CANCELLED_MESSAGE : NOTHING_TO_CANCEL_MESSAGE,
			);
			return true;
		}
		return false;
	}

	async function route(inbound: InboundUpdate) {
		const { chatId } = inbound;
		if (inbound.kind === "text") {
			const command = parseCommand(inbound.text);
			if (command && (await handleCommand(inbound, command))) return;
		}

		const pending = await approvals.get(chatId);
		if (inbound.kind === "callback") {
			await handleCallback(inbound, pending);
			return;
		}

		const userText =
			inbound.kind === "text" ? inbound.text : describeMedia(inbound);
		if (pending) {
			const decisionText =
				inbound.kind === "text" ? inbound.text : (inbound.caption ?? "");
			await handleDecision(
				inbound,
				pending,
				parseApprovalDecision(decisionText),
				userText,
			);
			return;
		}
		await handleQuery(inbound, userText);
	}

	async function processUpdate(update: Update) {
		const inbound = parseInboundUpdate(update);
		if (!inbound) {
			logger.info({
				event: "update_ignored",
				update_id: update.update_id,
				update_type: getUpdateType(update),
			});
			return;
		}
		logger.info({
			event: "update_received",
			update_id: update.update_id,
			update_type: getUpdateType(update),
			chat_id: inbound.chatId,
			kind: inbound.kind,
		});
		try {
			await route(inbound);
		} catch (cause) {
			const error = new ProcessingError(inbound.chatId, cause);
			logger.error({
				event: "processing_failed",
				chat_id: inbound.chatId,
				update_id: update.update_id,
				error,
				cause: cause instanceof Error ? cause : String(cause),
			});
			await sendText(inbound.chatId, GENERIC_ERROR_MESSAGE);
		}
	}

	return { process: processUpdate };
}
