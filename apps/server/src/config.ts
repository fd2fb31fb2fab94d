import { z } from "zod";
import dotenv from "dotenv";

// Load environment variables
dotenv.config();

const configSchema = z.object({
	// Server
	server: z.object({
		port: z.coerce.number().int().positive().default(3000),
		nodeEnv: z.enum(["development", "production", "test"]).default("development"),
	}),

	// Record store
	store: z.object({
		driver: z.enum(["redis", "memory"]).default("redis"),
	}),

	// Redis
	redis: z.object({
		host: z.string().default("localhost"),
		port: z.coerce.number().int().positive().default(6379),
		keyPrefix: z.string().min(1).default("tasks"),
	}),

	// Logging
	log: z.object({
		level: z.enum(["debug", "info", "warn", "error"]).default("info"),
	}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the service configuration from environment variables.
 * Unset variables fall back to their defaults; invalid ones throw a ZodError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return configSchema.parse({
		server: {
			port: env.PORT,
			nodeEnv: env.NODE_ENV,
		},
		store: {
			driver: env.STORE_DRIVER,
		},
		redis: {
			host: env.REDIS_HOST,
			port: env.REDIS_PORT,
			keyPrefix: env.REDIS_KEY_PREFIX,
		},
		log: {
			level: env.LOG_LEVEL,
		},
	});
}
