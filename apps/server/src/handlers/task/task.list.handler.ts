import type { TaskContext } from "@/core/context";
import { badRequest, ok } from "@/core/response";
import type { Envelope } from "@/core/response";

export interface TaskListRequest {
	query: Record<string, string | undefined>;
}

export class TaskListHandler {
	/**
	 * Without a `date` key every task is returned. With one, the value must be
	 * non-empty and is matched literally against each task's `date`.
	 */
	async handle(input: TaskListRequest, ctx: TaskContext): Promise<Envelope> {
		const date = input.query.date;

		if (date === undefined) {
			return ok(await ctx.store.scanAll());
		}

		if (date === "") {
			return badRequest("Query parameter 'date' is required. Example: /tasks?date=2025-12-04");
		}

		return ok(await ctx.store.scanByDate(date));
	}
}
