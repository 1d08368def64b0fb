import type { ModelMessage } from "ai";
import { z } from "zod";
import {
	type ApprovalRequestPart,
	toToolArguments,
} from "../tools/approvals.js";

export type ToolTurn = {
	toolName: string;
	output: string;
};

export type AgentAnswer = {
	type: "answer";
	text: string;
	toolTurns: ToolTurn[];
};

export type AgentApprovalRequest = ApprovalRequestPart & {
	type: "approval";
	/** Further approval requests raised in the same step. */
	queued: ApprovalRequestPart[];
	messages: ModelMessage[];
	toolTurns: ToolTurn[];
};

export type AgentOutcome = AgentAnswer | AgentApprovalRequest;

const approvalRequestPartSchema = z.object({
	type: z.literal("tool-approval-request"),
	approvalId: z.string().min(1),
	toolCall: z.object({
		toolCallId: z.string().min(1),
		toolName: z.string().min(1),
		input: z.unknown(),
	}),
});

const toolMessageSchema = z.object({
	role: z.literal("tool"),
	content: z.array(z.unknown()),
});

const toolResultPartSchema = z.object({
	type: z.literal("tool-result"),
	toolName: z.string(),
	output: z.unknown(),
});

const deniedOutputSchema = z.object({ type: z.literal("execution-denied") });

const toolOutputValueSchema = z.object({
	type: z.string(),
	value: z.unknown(),
});

export function findApprovalRequests(
	content: ReadonlyArray<unknown>,
): ApprovalRequestPart[] {
	const requests: ApprovalRequestPart[] = [];
	for (const part of content) {
		const parsed = approvalRequestPartSchema.safeParse(part);
		if (!parsed.success) continue;
		requests.push({
			approvalId: parsed.data.approvalId,
			toolCallId: parsed.data.toolCall.toolCallId,
			toolName: parsed.data.toolCall.toolName,
			toolArguments: toToolArguments(parsed.data.toolCall.input),
		});
	}
	return requests;
}

export const DENIED_TOOL_OUTPUT = "Not run: the user declined.";

export function stringifyToolOutput(output: unknown): string {
	if (deniedOutputSchema.safeParse(output).success) return DENIED_TOOL_OUTPUT;
	const parsed = toolOutputValueSchema.safeParse(output);
	if (parsed.success) {
		const { type, value } = parsed.data;
		if ((type === "text" || type === "error-text") && typeof value === "string") {
			return value;
		}
		return JSON.stringify(value) ?? "";
	}
	if (typeof output === "string") return output;
	return JSON.stringify(output) ?? "";
}

export function collectToolTurns(messages: ReadonlyArray<unknown>): ToolTurn[] {
	const turns: ToolTurn[] = [];
	for (const message of messages) {
		const parsed = toolMessageSchema.safeParse(message);
		if (!parsed.success) continue;
		for (const part of parsed.data.content) {
			const result = toolResultPartSchema.safeParse(part);
			if (!result.success) continue;
			turns.push({
				toolName: result.data.toolName,
				output: stringifyToolOutput(result.data.output),
			});
		}
	}
	return turns;
}

export function buildOutcome(params: {
	requestMessages: ModelMessage[];
	responseMessages: ModelMessage[];
	content: ReadonlyArray<unknown>;
	text: string;
	emptyAnswer: string;
}): AgentOutcome {
	const toolTurns = collectToolTurns(params.responseMessages);
	const [approval, ...queued] = findApprovalRequests(params.content);
	if (approval) {
		return {
			type: "approval",
			...approval,
			queued,
			messages: [...params.requestMessages, ...params.responseMessages],
			toolTurns,
		};
	}
	const text = params.text.trim();
	return {
		type: "answer",
		text: text || params.emptyAnswer,
		toolTurns,
	};
}
