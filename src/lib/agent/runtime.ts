import { createOpenAI } from "@ai-sdk/openai";
import {
	type ModelMessage,
	stepCountIs,
	type ToolApprovalResponse,
	ToolLoopAgent,
	type ToolSet,
} from "ai";
import type { Logger } from "../logger.js";
import type { SelectedModel } from "../../models.js";
import { buildAgentInstructions } from "../prompts/agent-instructions.js";
import type { PendingApproval } from "../tools/approvals.js";
import { wrapToolMapWithHooks } from "../tools/hooks.js";
import {
	formatToolLines,
	normalizeToolName,
	type ToolMeta,
} from "../tools/registry.js";
import {
	createWeatherTool,
	WEATHER_TOOL_DESCRIPTION,
	WEATHER_TOOL_NAME,
	type WeatherClient,
} from "../tools/weather.js";
import { type AgentOutcome, buildOutcome } from "./outcome.js";

export type {
	AgentAnswer,
	AgentApprovalRequest,
	AgentOutcome,
	ToolTurn,
} from "./outcome.js";

export type AgentCallHooks = {
	userName?: string;
	onToolStep?: (toolNames: string[]) => void;
};

export type AgentCompleteRequest = AgentCallHooks & {
	chatId: string;
	messages: ModelMessage[];
};

export type AgentResumeRequest = AgentCallHooks & {
	chatId: string;
	pending: PendingApproval;
	approved: boolean;
};

/**
 * Provider-agnostic contract the processor talks to. `complete` either
 * answers or pauses on a tool call that needs confirmation; `resume`
 * continues a paused run with the human's decision on that tool call.
 */
export type AgentRuntime = {
	complete: (request: AgentCompleteRequest) => Promise<AgentOutcome>;
	resume: (request: AgentResumeRequest) => Promise<AgentOutcome>;
};

export type AiAgentRuntimeDeps = {
	openaiApiKey: string;
	model: SelectedModel;
	weatherClient: WeatherClient;
	approvalRequired: Set<string>;
	webSearchEnabled: boolean;
	webSearchContextSize: "low" | "medium" | "high";
	maxSteps: number;
	logger: Logger;
};

const EMPTY_ANSWER = "I couldn't come up with an answer. Please try rephrasing.";

export type ApprovalResponse = {
	approvalId: string;
	approved: boolean;
};

export function buildApprovalResponseMessage(
	responses: ReadonlyArray<ApprovalResponse>,
): ModelMessage {
	return {
		role: "tool",
		content: responses.map(({ approvalId, approved }): ToolApprovalResponse => ({
			type: "tool-approval-response",
			approvalId,
			approved,
		})),
	};
}

/**
 * Every open request of the paused step gets an answer: earlier accepted
 * ones, the current decision, and a denial for anything still queued.
 */
export function collectApprovalResponses(
	pending: PendingApproval,
	approved: boolean,
): ApprovalResponse[] {
	return [
		...(pending.approvedIds ?? []).map((approvalId) => ({
			approvalId,
			approved: true,
		})),
		{ approvalId: pending.approvalId, approved },
		...(pending.queued ?? []).map(({ approvalId }) => ({
			approvalId,
			approved: false,
		})),
	];
}

export function createAiAgentRuntime(deps: AiAgentRuntimeDeps): AgentRuntime {
	const provider = createOpenAI({ apiKey: deps.openaiApiKey });
	const needsApproval = (name: string) =>
		deps.approvalRequired.has(normalizeToolName(name));

	const baseTools: ToolSet = {};
	const toolMetas: ToolMeta[] = [];
	const registerTool = (meta: ToolMeta, toolDef: ToolSet[string]) => {
		toolMetas.push(meta);
		baseTools[meta.name] = toolDef;
	};

	registerTool(
		{
			name: WEATHER_TOOL_NAME,
			description: WEATHER_TOOL_DESCRIPTION,
			source: "core",
			origin: "openweathermap",
			needsApproval: needsApproval(WEATHER_TOOL_NAME),
		},
		createWeatherTool(deps.weatherClient, {
			needsApproval: needsApproval(WEATHER_TOOL_NAME),
		}),
	);
	if (deps.webSearchEnabled) {
		registerTool(
			{
				name: "web_search",
				description:
					"Search the web for up-to-date information (OpenAI web_search).",
				source: "web",
				origin: "openai",
			},
			provider.tools.webSearch({
				searchContextSize: deps.webSearchContextSize,
			}) as unknown as ToolSet[string],
		);
	}

	const toolLines = formatToolLines(toolMetas);

	function createAgent(chatId: string, hooks: AgentCallHooks) {
		const tools = wrapToolMapWithHooks(baseTools, {
			beforeToolCall: ({ toolName, toolCallId, input }) => {
				deps.logger.info({
					event: "tool_call",
					tool: toolName,
					tool_call_id: toolCallId,
					chat_id: chatId,
					input,
				});
			},
			afterToolCall: ({ toolName, toolCallId, durationMs, error }) => {
				deps.logger.info({
					event: "tool_result",
					tool: toolName,
					tool_call_id: toolCallId,
					chat_id: chatId,
					duration_ms: durationMs,
					error,
				});
			},
		});
		return new ToolLoopAgent({
			model: provider(deps.model.config.id),
			instructions: buildAgentInstructions({
				modelRef: deps.model.ref,
				modelName: deps.model.config.label ?? deps.model.config.id,
				toolLines,
				userName: hooks.userName,
				currentDateTime: new Date().toISOString(),
			}),
			tools,
			stopWhen: stepCountIs(deps.maxSteps),
			onStepFinish: ({ toolCalls }) => {
				const names = (toolCalls ?? [])
					.map((call) => call?.toolName)
					.filter((name): name is string => Boolean(name));
				if (names.length > 0) {
					hooks.onToolStep?.(names);
				}
			},
		});
	}

	async function run(
		chatId: string,
		messages: ModelMessage[],
		hooks: AgentCallHooks,
	): Promise<AgentOutcome> {
		const agent = createAgent(chatId, hooks);
		const result = await agent.generate({ messages });
		return buildOutcome({
			requestMessages: messages,
			responseMessages: result.response.messages,
			content: result.content,
			text: result.text,
			emptyAnswer: EMPTY_ANSWER,
		});
	}

	return {
		complete: ({ chatId, messages, ...hooks }) => run(chatId, messages, hooks),
		resume: ({ chatId, pending, approved, ...hooks }) =>
			run(
				chatId,
				[
					...pending.messages,
					buildApprovalResponseMessage(
						collectApprovalResponses(pending, approved),
					),
				],
				hooks,
			),
	};
}
