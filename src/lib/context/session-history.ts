import type { ModelMessage } from "ai";
import type { ConversationRole, ConversationTurn } from "./conversation-store.js";

export function createTurn(
	chatId: string,
	role: ConversationRole,
	content: string,
	now: Date = new Date(),
): ConversationTurn {
	return { chatId, role, content, timestamp: now.toISOString() };
}

// Tool turns stay in the store for the record; the agent sees only the
// user/assistant exchange.
export function historyToModelMessages(
	turns: ConversationTurn[],
): ModelMessage[] {
	const messages: ModelMessage[] = [];
	for (const turn of turns) {
		if (!turn.content) continue;
		if (turn.role === "user") {
			messages.push({ role: "user", content: turn.content });
		} else if (turn.role === "assistant") {
			messages.push({ role: "assistant", content: turn.content });
		}
	}
	return messages;
}

export function formatToolTurn(toolName: string, output: string): string {
	return `[${toolName}] ${output}`;
}
