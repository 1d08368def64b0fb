import type { ToolExecutionOptions, ToolSet } from "ai";

export type ToolHookContext = {
	toolName: string;
	toolCallId?: string;
	input: unknown;
};

export type ToolHooks = {
	beforeToolCall?: (ctx: ToolHookContext) => void;
	afterToolCall?: (
		ctx: ToolHookContext & { durationMs: number; error?: string },
	) => void;
};

export function wrapToolMapWithHooks(
	tools: ToolSet,
	hooks: ToolHooks,
): ToolSet {
	const wrapped: ToolSet = {};
	for (const [name, toolDef] of Object.entries(tools)) {
		if (!toolDef?.execute) {
			wrapped[name] = toolDef;
			continue;
		}
		const execute = toolDef.execute;
		wrapped[name] = {
			...toolDef,
			execute: async (input: unknown, options: ToolExecutionOptions) => {
				const context: ToolHookContext = {
					toolName: name,
					toolCallId: options?.toolCallId,
					input,
				};
				hooks.beforeToolCall?.(context);
				const startedAt = Date.now();
				try {
					const result = await execute(input as never, options);
					hooks.afterToolCall?.({
						...context,
						durationMs: Date.now() - startedAt,
					});
					return result;
				} catch (error) {
					hooks.afterToolCall?.({
						...context,
						durationMs: Date.now() - startedAt,
						error: String(error),
					});
					throw error;
				}
			},
		};
	}
	return wrapped;
}
