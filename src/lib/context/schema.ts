import { sql } from "drizzle-orm";
import { bigserial, index, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const conversationTurns = pgTable(
	"conversation_turns",
	{
		id: bigserial("id", { mode: "number" }).primaryKey(),
		chatId: text("chat_id").notNull(),
		role: text("role", { enum: ["user", "assistant", "tool"] }).notNull(),
		content: text("content").notNull(),
		createdAt: timestamp("created_at", { withTimezone: true, mode: "date" })
			.defaultNow()
			.notNull(),
	},
	(table) => [index("conversation_turns_chat_idx").on(table.chatId, table.id)],
);

export const CREATE_CONVERSATION_TURNS_SQL = sql`
	CREATE TABLE IF NOT EXISTS conversation_turns (
		id BIGSERIAL PRIMARY KEY,
		chat_id TEXT NOT NULL,
		role TEXT NOT NULL,
		content TEXT NOT NULL,
		created_at TIMESTAMPTZ NOT NULL DEFAULT now()
	)
`;

export const CREATE_CONVERSATION_TURNS_INDEX_SQL = sql`
	CREATE INDEX IF NOT EXISTS conversation_turns_chat_idx
		ON conversation_turns (chat_id, id)
`;
