import type { TaskContext } from "@/core/context";
import { notFound, ok } from "@/core/response";
import type { Envelope } from "@/core/response";

export interface TaskGetRequest {
	id: string;
}

export class TaskGetHandler {
	async handle(input: TaskGetRequest, ctx: TaskContext): Promise<Envelope> {
		const record = await ctx.store.get(input.id);
		if (!record) {
			return notFound("Task not found.");
		}
		return ok(record);
	}
}
