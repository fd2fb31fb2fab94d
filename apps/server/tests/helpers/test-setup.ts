import { vi } from "vitest";
import { createContext } from "@/core/context";
import type { TaskContext } from "@/core/context";
import { createLogger } from "@/core/logger";
import type { LogLevel } from "@/core/logger";
import { MemoryTaskStore } from "@/core/memory-task-store";
import type { Task } from "@/schemas/task.schema";

export function createSink() {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

/**
 * Ids `task-1`, `task-2`, ... in call order
 */
export function sequentialIds(prefix = "task"): () => string {
	let next = 0;
	return () => `${prefix}-${++next}`;
}

/**
 * Standard setup for handler tests: an in-memory store, a captured logger
 * scoped "test" and predictable ids.
 */
export function setupTaskContext(seed: Task[] = [], level: LogLevel = "error") {
	const store = new MemoryTaskStore(seed);
	const sink = createSink();
	const ctx: TaskContext = createContext(store, createLogger("test", level, sink), sequentialIds());
	return { store, sink, ctx };
}

export const sampleTasks: Task[] = [
	{ id: "t-1", title: "Buy milk", description: "2L", date: "2025-12-04" },
	{ id: "t-2", title: "Call plumber", description: "", date: "2025-12-04" },
	{ id: "t-3", title: "Pay rent", description: "Transfer before noon", date: "2025-12-05" },
];
