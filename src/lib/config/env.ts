import { MissingEnvError } from "../errors.js";

export type BotEnv = Record<string, string | undefined>;

export const REQUIRED_BOT_ENV = [
	"TELEGRAM_BOT_TOKEN",
	"TELEGRAM_WEBHOOK_SECRET",
	"OPENAI_API_KEY",
	"OPENWEATHERMAP_API_KEY",
	"DATABASE_URL",
	"REDIS_URL",
] as const;

export type BotConfig = {
	TELEGRAM_BOT_TOKEN: string;
	TELEGRAM_WEBHOOK_SECRET: string;
	OPENAI_API_KEY: string;
	OPENWEATHERMAP_API_KEY: string;
	DATABASE_URL: string;
	REDIS_URL: string;
	OPENAI_MODEL: string;
	WEB_SEARCH_ENABLED: boolean;
	WEB_SEARCH_CONTEXT_SIZE: "low" | "medium" | "high";
	INPUT_GUARDRAIL_ENABLED: boolean;
	HISTORY_MAX_MESSAGES: number;
	TOOL_APPROVAL_REQUIRED: string;
	TOOL_APPROVAL_TTL_MS: number;
	AGENT_MAX_STEPS: number;
	TELEGRAM_TEXT_CHUNK_LIMIT: number;
	TELEGRAM_TIMEOUT_SECONDS: number;
	ALLOWED_TG_IDS: string;
	PUBLIC_BASE_URL: string;
	HOST: string;
	PORT: number;
	WORKER_CONCURRENCY: number;
	DEBUG_LOGS: boolean;
	SERVICE_NAME: string;
	RELEASE_VERSION?: string;
	COMMIT_HASH?: string;
	REGION?: string;
	INSTANCE_ID?: string;
};

export function resolveRequiredBotEnv(env: BotEnv): string[] {
	return REQUIRED_BOT_ENV.filter((key) => !env[key]?.trim());
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
	const value = Number.parseInt(raw ?? "", 10);
	return Number.isFinite(value) && value > 0 ? value : fallback;
}

function resolveWebSearchContextSize(
	raw: string | undefined,
): BotConfig["WEB_SEARCH_CONTEXT_SIZE"] {
	const normalized = raw?.trim().toLowerCase();
	if (normalized === "medium" || normalized === "high") return normalized;
	return "low";
}

function required(env: BotEnv, key: (typeof REQUIRED_BOT_ENV)[number]) {
	return env[key]?.trim() ?? "";
}

export function loadBotEnv(env: BotEnv): BotConfig {
	const missing = resolveRequiredBotEnv(env);
	if (missing.length > 0) {
		throw new MissingEnvError(missing);
	}
	return {
		TELEGRAM_BOT_TOKEN: required(env, "TELEGRAM_BOT_TOKEN"),
		TELEGRAM_WEBHOOK_SECRET: required(env, "TELEGRAM_WEBHOOK_SECRET"),
		OPENAI_API_KEY: required(env, "OPENAI_API_KEY"),
		OPENWEATHERMAP_API_KEY: required(env, "OPENWEATHERMAP_API_KEY"),
		DATABASE_URL: required(env, "DATABASE_URL"),
		REDIS_URL: required(env, "REDIS_URL"),
		OPENAI_MODEL: env.OPENAI_MODEL ?? "",
		WEB_SEARCH_ENABLED: env.WEB_SEARCH_ENABLED === "1",
		WEB_SEARCH_CONTEXT_SIZE: resolveWebSearchContextSize(
			env.WEB_SEARCH_CONTEXT_SIZE,
		),
		INPUT_GUARDRAIL_ENABLED: env.INPUT_GUARDRAIL_ENABLED === "1",
		HISTORY_MAX_MESSAGES: parsePositiveInt(env.HISTORY_MAX_MESSAGES, 20),
		TOOL_APPROVAL_REQUIRED: env.TOOL_APPROVAL_REQUIRED ?? "",
		TOOL_APPROVAL_TTL_MS: parsePositiveInt(
			env.TOOL_APPROVAL_TTL_MS,
			60 * 60 * 1000,
		),
		AGENT_MAX_STEPS: parsePositiveInt(env.AGENT_MAX_STEPS, 6),
		TELEGRAM_TEXT_CHUNK_LIMIT: parsePositiveInt(
			env.TELEGRAM_TEXT_CHUNK_LIMIT,
			4000,
		),
		TELEGRAM_TIMEOUT_SECONDS: parsePositiveInt(
			env.TELEGRAM_TIMEOUT_SECONDS,
			60,
		),
		ALLOWED_TG_IDS: env.ALLOWED_TG_IDS ?? "",
		PUBLIC_BASE_URL: env.PUBLIC_BASE_URL?.trim() ?? "",
		HOST: env.HOST?.trim() || "0.0.0.0",
		PORT: parsePositiveInt(env.PORT, 8000),
		WORKER_CONCURRENCY: parsePositiveInt(env.WORKER_CONCURRENCY, 10),
		DEBUG_LOGS: env.DEBUG_LOGS === "1",
		SERVICE_NAME: env.SERVICE_NAME ?? "weather-agent-bot",
		RELEASE_VERSION: env.RELEASE_VERSION ?? env.APP_VERSION ?? undefined,
		COMMIT_HASH: env.COMMIT_HASH ?? env.GIT_COMMIT ?? undefined,
		REGION: env.REGION ?? undefined,
		INSTANCE_ID: env.INSTANCE_ID ?? undefined,
	};
}
