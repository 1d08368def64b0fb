import dotenv from "dotenv";
import { createGateway, createServiceLogger } from "./bot.js";
import { loadBotEnv } from "./lib/config/env.js";
import { createNodeServer, listen } from "./lib/gateway/node-server.js";
import { createBullUpdateQueue } from "./lib/queue/updates-queue.js";
import { createRedisConnection } from "./lib/redis.js";

dotenv.config();

const config = loadBotEnv(process.env);
const logger = createServiceLogger(config);
const redis = createRedisConnection(config.REDIS_URL);
const queue = createBullUpdateQueue(redis);
const server = createNodeServer(
	createGateway({ config, queue, logger }),
	logger,
);

await listen(server, config.HOST, config.PORT);
logger.info({ event: "server_started", host: config.HOST, port: config.PORT });

async function shutdown(signal: string) {
	logger.info({ event: "server_stopping", signal });
	server.close();
	await queue.close();
	await redis.quit();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => {
		shutdown(signal).catch((error: unknown) => {
			logger.error({ event: "shutdown_failed", error });
			process.exitCode = 1;
		});
	});
}
