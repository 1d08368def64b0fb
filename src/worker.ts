import dotenv from "dotenv";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import { createServiceLogger, createWorkerProcessor } from "./bot.js";
import { loadBotEnv } from "./lib/config/env.js";
import { createUpdatesWorker } from "./lib/queue/worker.js";
import { createRedisConnection, createRedisKeyValue } from "./lib/redis.js";
import { loadModelsConfig } from "./models.js";

dotenv.config();

const config = loadBotEnv(process.env);
const logger = createServiceLogger(config);

const pool = new pg.Pool({ connectionString: config.DATABASE_URL });
const redis = createRedisConnection(config.REDIS_URL);
const { processor, conversations, model } = createWorkerProcessor({
	config,
	modelsConfig: await loadModelsConfig(),
	db: drizzle(pool),
	keyValue: createRedisKeyValue(redis),
	logger,
});
await conversations.ensureSchema();

const worker = createUpdatesWorker({
	connection: redis,
	processor,
	concurrency: config.WORKER_CONCURRENCY,
	logger,
});
logger.info({
	event: "worker_started",
	model: model.ref,
	concurrency: config.WORKER_CONCURRENCY,
});

async function shutdown(signal: string) {
	logger.info({ event: "worker_stopping", signal });
	await worker.close();
	await redis.quit();
	await pool.end();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => {
		shutdown(signal).catch((error: unknown) => {
			logger.error({ event: "shutdown_failed", error });
			process.exitCode = 1;
		});
	});
}
