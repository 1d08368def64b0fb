import { desc, eq } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import {
	CREATE_CONVERSATION_TURNS_INDEX_SQL,
	CREATE_CONVERSATION_TURNS_SQL,
	conversationTurns,
} from "./schema.js";

export type ConversationRole = "user" | "assistant" | "tool";

export type ConversationTurn = {
	chatId: string;
	role: ConversationRole;
	content: string;
	timestamp: string;
};

export type ConversationStore = {
	append: (turn: ConversationTurn) => Promise<void>;
	/** Most recent `limit` turns for the chat, oldest first. */
	load: (chatId: string, limit: number) => Promise<ConversationTurn[]>;
};

export function createPgConversationStore<TQueryResult extends PgQueryResultHKT>(
	db: PgDatabase<TQueryResult>,
): ConversationStore & { ensureSchema: () => Promise<void> } {
	const ensureSchema = async () => {
		await db.execute(CREATE_CONVERSATION_TURNS_SQL);
		await db.execute(CREATE_CONVERSATION_TURNS_INDEX_SQL);
	};

	const append = async (turn: ConversationTurn) => {
		await db.insert(conversationTurns).values({
			chatId: turn.chatId,
			role: turn.role,
			content: turn.content,
			createdAt: new Date(turn.timestamp),
		});
	};

	const load = async (chatId: string, limit: number) => {
		if (!chatId || limit <= 0) return [];
		const rows = await db
			.select()
			.from(conversationTurns)
			.where(eq(conversationTurns.chatId, chatId))
			.orderBy(desc(conversationTurns.id))
			.limit(limit);
		return rows.reverse().map((row) => ({
			chatId: row.chatId,
			role: row.role,
			content: row.content,
			timestamp: row.createdAt.toISOString(),
		}));
	};

	return { ensureSchema, append, load };
}
