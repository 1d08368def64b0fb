import { Redis } from "ioredis";

export type KeyValueClient = {
	get: (key: string) => Promise<string | null>;
	setIfAbsent: (key: string, value: string, ttlMs: number) => Promise<boolean>;
	put: (key: string, value: string, ttlMs: number) => Promise<void>;
	delete: (key: string) => Promise<number>;
};

export function createRedisConnection(url: string): Redis {
	// BullMQ rejects blocking connections that cap retries per request.
	return new Redis(url, { maxRetriesPerRequest: null });
}

export function createRedisKeyValue(redis: Redis): KeyValueClient {
	return {
		get: (key) => redis.get(key),
		setIfAbsent: async (key, value, ttlMs) => {
			const result = await redis.set(key, value, "PX", ttlMs, "NX");
			return result === "OK";
		},
		put: async (key, value, ttlMs) => {
			await redis.set(key, value, "PX", ttlMs);
		},
		delete: (key) => redis.del(key),
	};
}
