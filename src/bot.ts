import { createOpenAI } from "@ai-sdk/openai";
import { apiThrottler } from "@grammyjs/transformer-throttler";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { Api } from "grammy";
import { createWeatherGuardrail } from "./lib/agent/guardrail.js";
import { createAiAgentRuntime } from "./lib/agent/runtime.js";
import {
	createTelegramFiles,
	createTelegramResponder,
} from "./lib/bot/telegram.js";
import type { BotConfig } from "./lib/config/env.js";
import { createPgConversationStore } from "./lib/context/conversation-store.js";
import { createRoutes } from "./lib/gateway/routes.js";
import { createDebugLogger, createLogger, type Logger } from "./lib/logger.js";
import { createUpdateProcessor } from "./lib/processor.js";
import type { UpdateQueue } from "./lib/queue/updates-queue.js";
import type { KeyValueClient } from "./lib/redis.js";
import { createApprovalStore, parseApprovalList } from "./lib/tools/approvals.js";
import { createWeatherClient } from "./lib/tools/weather.js";
import { type ModelsFile, selectModelOrDefault } from "./models.js";

export function createServiceLogger(config: BotConfig): Logger {
	return createLogger({
		service: config.SERVICE_NAME,
		version: config.RELEASE_VERSION,
		commit_hash: config.COMMIT_HASH,
		region: config.REGION,
		instance_id: config.INSTANCE_ID,
	});
}

export function createTelegramApi(config: BotConfig): Api {
	const api = new Api(config.TELEGRAM_BOT_TOKEN, {
		timeoutSeconds: config.TELEGRAM_TIMEOUT_SECONDS,
	});
	api.config.use(apiThrottler());
	return api;
}

export function createGateway(params: {
	config: BotConfig;
	queue: Pick<UpdateQueue, "enqueue">;
	logger: Logger;
}) {
	const { config } = params;
	return createRoutes({
		webhookSecret: config.TELEGRAM_WEBHOOK_SECRET,
		queue: params.queue,
		telegram: createTelegramApi(config),
		env: { ALLOWED_TG_IDS: config.ALLOWED_TG_IDS },
		publicBaseUrl: config.PUBLIC_BASE_URL,
		logger: params.logger,
	});
}

export function createWorkerProcessor(params: {
	config: BotConfig;
	modelsConfig: ModelsFile;
	db: NodePgDatabase<Record<string, never>>;
	keyValue: KeyValueClient;
	logger: Logger;
}) {
	const { config, logger } = params;
	const logDebug = createDebugLogger(config.DEBUG_LOGS, logger);

	const model = selectModelOrDefault(
		params.modelsConfig,
		config.OPENAI_MODEL,
		(ref) => logger.warn({ event: "model_unknown", model: ref }),
	);
	const api = createTelegramApi(config);
	const conversations = createPgConversationStore(params.db);
	const runtime = createAiAgentRuntime({
		openaiApiKey: config.OPENAI_API_KEY,
		model,
		weatherClient: createWeatherClient({
			apiKey: config.OPENWEATHERMAP_API_KEY,
		}),
		approvalRequired: new Set(parseApprovalList(config.TOOL_APPROVAL_REQUIRED)),
		webSearchEnabled: config.WEB_SEARCH_ENABLED,
		webSearchContextSize: config.WEB_SEARCH_CONTEXT_SIZE,
		maxSteps: config.AGENT_MAX_STEPS,
		logger,
	});
	const processor = createUpdateProcessor({
		runtime,
		conversations,
		approvals: createApprovalStore(params.keyValue, {
			ttlMs: config.TOOL_APPROVAL_TTL_MS,
			logger,
		}),
		responder: createTelegramResponder({
			api,
			textChunkLimit: config.TELEGRAM_TEXT_CHUNK_LIMIT,
			logDebug,
		}),
		files: createTelegramFiles(api, config.TELEGRAM_BOT_TOKEN),
		guardrail: config.INPUT_GUARDRAIL_ENABLED
			? createWeatherGuardrail(
					createOpenAI({ apiKey: config.OPENAI_API_KEY })(model.config.id),
				)
			: undefined,
		historyLimit: config.HISTORY_MAX_MESSAGES,
		logger,
	});
	return { processor, conversations, model };
}
