import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { createLogger } from "./core/logger";
import { createServer, createTaskStore } from "./server";

async function main(): Promise<void> {
	const config = loadConfig();
	const logger = createLogger("tasks", config.log.level);

	logger.info("🚀 Starting task records server...");
	const store = await createTaskStore(config, logger.child("store"));
	const { app } = createServer({ store, logger });

	const server = serve({ fetch: app.fetch, port: config.server.port });
	logger.info(`🎯 Server running at http://localhost:${config.server.port}`);

	// Graceful shutdown
	let closing = false;
	const shutdown = async (signal: string) => {
		if (closing) return;
		closing = true;
		logger.info(`📴 ${signal} received, shutting down...`);
		server.close();
		await store.close();
		logger.info("✅ Shutdown complete");
	};

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			shutdown(signal)
				.then(() => process.exit(0))
				.catch((error: unknown) => {
					logger.error("❌ Error during shutdown:", error);
					process.exit(1);
				});
		});
	}
}

main().catch((error: unknown) => {
	console.error("❌ Failed to start task records server:", error);
	process.exit(1);
});
