import type { Task, TaskUpdateFields } from "../schemas/task.schema";
import { TaskNotFoundError } from "./errors";
import type { TaskStore } from "./task-store";

/**
 * Map-backed record store. Records are copied in and out.
 */
export class MemoryTaskStore implements TaskStore {
	private records = new Map<string, Task>();

	constructor(seed: Task[] = []) {
		for (const task of seed) {
			this.records.set(task.id, { ...task });
		}
	}

	async get(id: string): Promise<Task | null> {
		const record = this.records.get(id);
		return record ? { ...record } : null;
	}

	async put(task: Task): Promise<void> {
		this.records.set(task.id, { ...task });
	}

	async updateFields(id: string, fields: TaskUpdateFields): Promise<Task> {
		const record = this.records.get(id);
		if (!record) {
			throw new TaskNotFoundError(id);
		}

		const updated: Task = { ...record };
		if (fields.title !== undefined) updated.title = fields.title;
		if (fields.description !== undefined) updated.description = fields.description;
		if (fields.date !== undefined) updated.date = fields.date;

		this.records.set(id, updated);
		return { ...updated };
	}

	async delete(id: string): Promise<void> {
		this.records.delete(id);
	}

	async scanAll(): Promise<Task[]> {
		return Array.from(this.records.values(), (record) => ({ ...record }));
	}

	async scanByDate(date: string): Promise<Task[]> {
		const all = await this.scanAll();
		return all.filter((record) => record.date === date);
	}

	async ping(): Promise<boolean> {
		return true;
	}

	async close(): Promise<void> {
		this.records.clear();
	}
}
