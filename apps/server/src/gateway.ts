import { loadConfig } from "./config";
import { createContext } from "./core/context";
import { createLogger } from "./core/logger";
import type { Envelope } from "./core/response";
import { createTaskHandlers } from "./handlers/task";
import { createTaskStore } from "./server";
import { createGatewayHandler } from "./transports/gateway";
import type { GatewayEvent } from "./transports/gateway";
import { TaskRouter } from "./transports/router";

export type GatewayEntry = (event: GatewayEvent) => Promise<Envelope>;

/**
 * Entry for gateway-style invocations. The store and router are built from
 * `env` on the first event and reused by later ones in the same process.
 */
export function createGatewayEntry(env: NodeJS.ProcessEnv = process.env): GatewayEntry {
	let ready: Promise<GatewayEntry> | null = null;

	const initialize = async (): Promise<GatewayEntry> => {
		const config = loadConfig(env);
		const logger = createLogger("tasks", config.log.level);
		const store = await createTaskStore(config, logger.child("store"));
		const router = new TaskRouter(createTaskHandlers(), createContext(store, logger.child("tasks")));
		return createGatewayHandler(router);
	};

	return async (event) => {
		if (!ready) {
			ready = initialize();
		}
		const handle = await ready;
		return handle(event);
	};
}

export const handler = createGatewayEntry();
