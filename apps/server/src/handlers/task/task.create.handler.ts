import type { TaskContext } from "@/core/context";
import { badRequest, created } from "@/core/response";
import type { Envelope } from "@/core/response";
import { taskCreateInput } from "@/schemas/task.schema";
import type { Task } from "@/schemas/task.schema";

export interface TaskCreateRequest {
	body: Record<string, unknown>;
}

export class TaskCreateHandler {
	async handle(input: TaskCreateRequest, ctx: TaskContext): Promise<Envelope> {
		const parsed = taskCreateInput.safeParse(input.body);
		if (!parsed.success) {
			return badRequest("Fields 'title' and 'date' are required.");
		}

		const record: Task = {
			id: ctx.newId(),
			title: parsed.data.title,
			description: parsed.data.description,
			date: parsed.data.date,
		};

		await ctx.store.put(record);
		ctx.logger.debug(`Created task ${record.id}`);

		return created(record);
	}
}
