import { MockLanguageModelV3 } from "ai/test";
import { beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { AgentRuntime } from "../src/lib/agent/runtime.js";
import { DENIED_TOOL_OUTPUT } from "../src/lib/agent/outcome.js";
import type { PendingApproval } from "../src/lib/tools/approvals.js";
import { createMemoryLogger } from "./support/fakes.js";

const usage = {
	inputTokens: { total: 1, noCache: 1, cacheRead: 0, cacheWrite: 0 },
	outputTokens: { total: 1, text: 1, reasoning: 0 },
};

let plannedCalls: Array<{ id: string; location: string }> = [];

const model = new MockLanguageModelV3({
	doGenerate: async (options) => {
		const last = options.prompt.at(-1);
		if (last?.role === "tool" || plannedCalls.length === 0) {
			return {
				content: [{ type: "text", text: "Here is the weather." }],
				finishReason: { unified: "stop", raw: "stop" },
				usage,
				warnings: [],
			};
		}
		return {
			content: plannedCalls.map((call) => ({
				type: "tool-call" as const,
				toolCallId: call.id,
				toolName: "get_weather",
				input: JSON.stringify({ location: call.location, unit: "metric" }),
			})),
			finishReason: { unified: "tool-calls", raw: "tool_calls" },
			usage,
			warnings: [],
		};
	},
});

vi.mock("@ai-sdk/openai", () => ({
	createOpenAI: () => Object.assign(() => model, { tools: {} }),
}));

let createAiAgentRuntime: typeof import("../src/lib/agent/runtime.js").createAiAgentRuntime;

beforeAll(async () => {
	({ createAiAgentRuntime } = await import("../src/lib/agent/runtime.js"));
});

function setup(approvalRequired: string[]) {
	const fetched: string[] = [];
	const log = createMemoryLogger();
	const runtime: AgentRuntime = createAiAgentRuntime({
		openaiApiKey: "test-key",
		model: {
			ref: "openai/test-model",
			config: { provider: "openai", id: "test-model" },
		},
		weatherClient: {
			fetchWeather: async ({ location }) => {
				fetched.push(location);
				return `Weather in ${location}: 18°C`;
			},
		},
		approvalRequired: new Set(approvalRequired),
		webSearchEnabled: false,
		webSearchContextSize: "low",
		maxSteps: 6,
		logger: log.logger,
	});
	return { runtime, fetched, log };
}

function toPending(
	outcome: Awaited<ReturnType<AgentRuntime["complete"]>>,
): PendingApproval {
	if (outcome.type !== "approval") throw new Error("expected an approval");
	return {
		chatId: "42",
		approvalId: outcome.approvalId,
		toolCallId: outcome.toolCallId,
		toolName: outcome.toolName,
		toolArguments: outcome.toolArguments,
		requestedAt: "2026-01-20T00:00:00.000Z",
		messages: outcome.messages,
		queued: outcome.queued,
		approvedIds: [],
	};
}

const question = [{ role: "user" as const, content: "Weather in Paris?" }];

beforeEach(() => {
	plannedCalls = [];
	model.doGenerateCalls.length = 0;
});

describe("ai agent runtime", () => {
	it("runs a tool without approval straight through", async () => {
		plannedCalls = [{ id: "c1", location: "Paris" }];
		const { runtime, fetched, log } = setup([]);
		const onToolStep = vi.fn();

		const outcome = await runtime.complete({
			chatId: "42",
			messages: question,
			onToolStep,
		});

		expect(outcome).toEqual({
			type: "answer",
			text: "Here is the weather.",
			toolTurns: [{ toolName: "get_weather", output: "Weather in Paris: 18°C" }],
		});
		expect(fetched).toEqual(["Paris"]);
		expect(onToolStep).toHaveBeenCalledWith(["get_weather"]);
		expect(log.events()).toEqual(["tool_call", "tool_result"]);
	});

	it("pauses on a tool that needs approval and runs it on resume", async () => {
		plannedCalls = [{ id: "c1", location: "Paris" }];
		const { runtime, fetched } = setup(["get_weather"]);

		const first = await runtime.complete({ chatId: "42", messages: question });

		expect(first).toMatchObject({
			type: "approval",
			toolCallId: "c1",
			toolName: "get_weather",
			toolArguments: { location: "Paris", unit: "metric" },
			queued: [],
		});
		expect(fetched).toEqual([]);

		const resumed = await runtime.resume({
			chatId: "42",
			pending: toPending(first),
			approved: true,
		});

		expect(resumed).toEqual({
			type: "answer",
			text: "Here is the weather.",
			toolTurns: [{ toolName: "get_weather", output: "Weather in Paris: 18°C" }],
		});
		expect(fetched).toEqual(["Paris"]);
	});

	it("does not run a denied tool", async () => {
		plannedCalls = [{ id: "c1", location: "Paris" }];
		const { runtime, fetched } = setup(["get_weather"]);

		const first = await runtime.complete({ chatId: "42", messages: question });
		const resumed = await runtime.resume({
			chatId: "42",
			pending: toPending(first),
			approved: false,
		});

		expect(resumed).toEqual({
			type: "answer",
			text: "Here is the weather.",
			toolTurns: [{ toolName: "get_weather", output: DENIED_TOOL_OUTPUT }],
		});
		expect(fetched).toEqual([]);
	});

	it("answers every parallel approval request when resuming", async () => {
		plannedCalls = [
			{ id: "c1", location: "Paris" },
			{ id: "c2", location: "London" },
		];
		const { runtime, fetched } = setup(["get_weather"]);

		const first = await runtime.complete({ chatId: "42", messages: question });
		if (first.type !== "approval") throw new Error("expected an approval");
		expect(first.toolArguments).toEqual({ location: "Paris", unit: "metric" });
		expect(first.queued).toHaveLength(1);
		expect(first.queued[0]).toMatchObject({
			toolCallId: "c2",
			toolArguments: { location: "London", unit: "metric" },
		});

		const pending = toPending(first);
		const second = pending.queued?.[0];
		if (!second) throw new Error("expected a queued request");
		const resumed = await runtime.resume({
			chatId: "42",
			pending: {
				...pending,
				...second,
				queued: [],
				approvedIds: [pending.approvalId],
			},
			approved: true,
		});

		expect(resumed.type).toBe("answer");
		expect(fetched).toEqual(["Paris", "London"]);
	});
});
