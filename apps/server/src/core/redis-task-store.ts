import { z } from "zod";
import { task, TASK_UPDATABLE_FIELDS } from "../schemas/task.schema";
import type { Task, TaskUpdateFields } from "../schemas/task.schema";
import { errorMessage, TaskNotFoundError, TaskStoreError } from "./errors";
import { TASK_UPDATE_FIELDS } from "./lua-scripts";
import { redisKey } from "./redis";
import type { TaskStore } from "./task-store";

/**
 * The subset of the ioredis client the store calls.
 */
export interface TaskRedisClient {
	hgetall(key: string): Promise<Record<string, string>>;
	hset(key: string, data: Record<string, string>): Promise<number>;
	del(key: string): Promise<number>;
	scan(
		cursor: string,
		matchToken: "MATCH",
		pattern: string,
		countToken: "COUNT",
		count: number
	): Promise<[cursor: string, elements: string[]]>;
	eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
	ping(): Promise<string>;
	quit(): Promise<unknown>;
}

const updateReply = z.union([
	z.tuple([z.literal(0), z.string()]).transform(([, error]) => ({ found: false as const, error })),
	z.tuple([z.literal(1), z.array(z.string())]).transform(([, pairs]) => ({ found: true as const, pairs })),
]);

function pairsToHash(pairs: string[]): Record<string, string> {
	const hash: Record<string, string> = {};
	for (let i = 0; i + 1 < pairs.length; i += 2) {
		hash[pairs[i]] = pairs[i + 1];
	}
	return hash;
}

/**
 * Task records as Redis hashes under `{prefix}:task:{id}`.
 *
 * There is no index set: listing walks the keyspace with SCAN.
 */
export class RedisTaskStore implements TaskStore {
	constructor(
		private readonly redis: TaskRedisClient,
		private readonly prefix = "tasks",
		private readonly scanCount = 100
	) {}

	async get(id: string): Promise<Task | null> {
		const hash = await this.run("get", () => this.redis.hgetall(this.key(id)));
		if (Object.keys(hash).length === 0) {
			return null;
		}
		return this.toTask(hash, id);
	}

	async put(record: Task): Promise<void> {
		await this.run("put", () =>
			this.redis.hset(this.key(record.id), {
				id: record.id,
				title: record.title,
				description: record.description,
				date: record.date,
			})
		);
	}

	async updateFields(id: string, fields: TaskUpdateFields): Promise<Task> {
		const args: string[] = [];
		for (const field of TASK_UPDATABLE_FIELDS) {
			const value = fields[field];
			if (value !== undefined) args.push(field, value);
		}

		const raw = await this.run("update", () =>
			this.redis.eval(TASK_UPDATE_FIELDS, 1, this.key(id), ...args)
		);
		const reply = updateReply.safeParse(raw);
		if (!reply.success) {
			throw new TaskStoreError(`Unexpected reply from update script for task ${id}`);
		}
		if (!reply.data.found) {
			throw new TaskNotFoundError(id);
		}
		return this.toTask(pairsToHash(reply.data.pairs), id);
	}

	async delete(id: string): Promise<void> {
		await this.run("delete", () => this.redis.del(this.key(id)));
	}

	async scanAll(): Promise<Task[]> {
		const pattern = this.key("*");
		const keys = new Set<string>();
		let cursor = "0";

		// SCAN may return a key more than once
		do {
			const [next, batch] = await this.run("scan", () =>
				this.redis.scan(cursor, "MATCH", pattern, "COUNT", this.scanCount)
			);
			for (const key of batch) keys.add(key);
			cursor = next;
		} while (cursor !== "0");

		const hashes = await Promise.all(
			Array.from(keys, (key) => this.run("scan", () => this.redis.hgetall(key)))
		);

		// Records deleted between SCAN and HGETALL come back empty
		return hashes
			.filter((hash) => Object.keys(hash).length > 0)
			.map((hash) => this.toTask(hash, hash.id ?? ""));
	}

	async scanByDate(date: string): Promise<Task[]> {
		const all = await this.scanAll();
		return all.filter((record) => record.date === date);
	}

	async ping(): Promise<boolean> {
		try {
			return (await this.redis.ping()) === "PONG";
		} catch {
			return false;
		}
	}

	async close(): Promise<void> {
		await this.redis.quit();
	}

	private key(id: string): string {
		return redisKey(this.prefix, "task", id);
	}

	private toTask(hash: Record<string, string>, id: string): Task {
		const parsed = task.safeParse(hash);
		if (!parsed.success) {
			throw new TaskStoreError(`Malformed task record ${id}`);
		}
		return parsed.data;
	}

	private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
		try {
			return await command();
		} catch (error) {
			throw new TaskStoreError(`Redis ${operation} failed: ${errorMessage(error)}`, { cause: error });
		}
	}
}
