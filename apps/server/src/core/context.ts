import { randomUUID } from "crypto";
import type { Logger } from "./logger";
import type { TaskStore } from "./task-store";

export interface TaskContext {
	// Data access
	store: TaskStore;

	// Observability
	logger: Logger;

	// Mints ids for new records
	newId: () => string;
}

export function createContext(
	store: TaskStore,
	logger: Logger,
	newId: () => string = randomUUID
): TaskContext {
	return { store, logger, newId };
}
