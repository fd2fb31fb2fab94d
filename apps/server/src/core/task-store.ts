import type { Task, TaskUpdateFields } from "../schemas/task.schema";

/**
 * Contract of the key-value collection holding task records, keyed by `id`.
 *
 * No secondary index is assumed: `scanByDate` is a filtered full scan.
 */
export interface TaskStore {
	get(id: string): Promise<Task | null>;

	/** Insert or replace the record under `task.id`. */
	put(task: Task): Promise<void>;

	/**
	 * Apply only the given field assignments and return the full record.
	 * Throws `TaskNotFoundError` when no record exists under `id`.
	 */
	updateFields(id: string, fields: TaskUpdateFields): Promise<Task>;

	delete(id: string): Promise<void>;

	scanAll(): Promise<Task[]>;

	scanByDate(date: string): Promise<Task[]>;

	/** Liveness of the backend; never rejects. */
	ping(): Promise<boolean>;

	close(): Promise<void>;
}
