import Redis from "ioredis";
import type { Redis as RedisClient, RedisOptions } from "ioredis";

/**
 * Owns the ioredis client used by the record store. Constructed once by the
 * entry point and handed to whoever needs it.
 */
export class RedisConnection {
	private readonly redis: RedisClient;

	constructor(options: RedisOptions = {}) {
		const defaultOptions: RedisOptions = {
			host: "localhost",
			port: 6379,
			retryStrategy: (times) => Math.min(times * 50, 2000),
			// Commands fail on the first error; nothing is retried or re-sent
			maxRetriesPerRequest: 0,
			autoResendUnfulfilledCommands: false,
			enableReadyCheck: true,
			lazyConnect: true,
			connectionName: "tasks:store",
		};

		this.redis = new Redis({ ...defaultOptions, ...options });
	}

	get client(): RedisClient {
		return this.redis;
	}

	async connect(): Promise<void> {
		if (this.redis.status === "wait") {
			await this.redis.connect();
		}
	}

	// Helper for Redis key namespacing
	static key(...parts: string[]): string {
		return parts.join(":");
	}
}

// Export key helper
export const redisKey = RedisConnection.key;
