import type { TaskContext } from "@/core/context";
import { noContent, notFound } from "@/core/response";
import type { Envelope } from "@/core/response";

export interface TaskDeleteRequest {
	id: string;
}

export class TaskDeleteHandler {
	async handle(input: TaskDeleteRequest, ctx: TaskContext): Promise<Envelope> {
		const existing = await ctx.store.get(input.id);
		if (!existing) {
			return notFound("Task not found.");
		}

		await ctx.store.delete(input.id);
		ctx.logger.debug(`Deleted task ${input.id}`);

		return noContent();
	}
}
