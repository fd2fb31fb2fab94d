import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import type { Config } from "./config";
import { createContext } from "./core/context";
import type { Logger } from "./core/logger";
import { MemoryTaskStore } from "./core/memory-task-store";
import { RedisConnection } from "./core/redis";
import { RedisTaskStore } from "./core/redis-task-store";
import type { TaskStore } from "./core/task-store";
import { createTaskHandlers } from "./handlers/task";
import { registerTaskRoutes } from "./transports/http-routes";
import { TaskRouter } from "./transports/router";

export interface ServerOptions {
	store: TaskStore;
	logger: Logger;
	newId?: () => string;
}

export interface TaskServer {
	app: Hono;
	router: TaskRouter;
}

/**
 * Build the record store selected by `store.driver`.
 */
export async function createTaskStore(config: Config, logger: Logger): Promise<TaskStore> {
	switch (config.store.driver) {
		case "memory":
			logger.warn("Using in-memory task store; records are lost on exit");
			return new MemoryTaskStore();

		case "redis": {
			const connection = new RedisConnection({
				host: config.redis.host,
				port: config.redis.port,
			});
			await connection.connect();
			logger.info(`Connected to Redis at ${config.redis.host}:${config.redis.port}`);
			return new RedisTaskStore(connection.client, config.redis.keyPrefix);
		}
	}
}

export function createServer({ store, logger, newId }: ServerOptions): TaskServer {
	const router = new TaskRouter(createTaskHandlers(), createContext(store, logger.child("tasks"), newId));
	const httpLogger = logger.child("http");
	const app = new Hono();

	// Middleware setup
	app.use(requestLogger((message, ...rest) => httpLogger.info(message, ...rest)));
	const taskCors = cors({
		origin: "*",
		allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
		allowHeaders: ["Content-Type"],
	});
	app.use("/tasks", taskCors);
	app.use("/tasks/*", taskCors);

	// Health check endpoint
	app.get("/health", async (c) => {
		const healthy = await store.ping();
		return c.json(
			{
				status: healthy ? "healthy" : "unhealthy",
				service: "task-records",
				timestamp: new Date().toISOString(),
			},
			healthy ? 200 : 503
		);
	});

	registerTaskRoutes(app, router);

	return { app, router };
}
