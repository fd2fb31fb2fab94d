import type { TaskContext } from "@/core/context";
import { errorMessage } from "@/core/errors";
import { badRequest, internalError, ok } from "@/core/response";
import type { Envelope } from "@/core/response";
import { TASK_UPDATABLE_FIELDS, taskUpdateFields } from "@/schemas/task.schema";

export interface TaskUpdateRequest {
	id: string;
	body: Record<string, unknown>;
}

export class TaskUpdateHandler {
	async handle(input: TaskUpdateRequest, ctx: TaskContext): Promise<Envelope> {
		// Only keys present in the body are applied, even when the value is ""
		const present: Record<string, unknown> = {};
		for (const field of TASK_UPDATABLE_FIELDS) {
			if (Object.prototype.hasOwnProperty.call(input.body, field)) {
				present[field] = input.body[field];
			}
		}

		if (Object.keys(present).length === 0) {
			return badRequest("No fields to update.");
		}

		const fields = taskUpdateFields.safeParse(present);
		if (!fields.success) {
			return badRequest("Fields 'title', 'description' and 'date' must be strings.");
		}

		// Missing records are reported like any other storage failure
		try {
			const updated = await ctx.store.updateFields(input.id, fields.data);
			return ok(updated);
		} catch (error) {
			const message = errorMessage(error);
			ctx.logger.error(`Failed to update task ${input.id}: ${message}`);
			return internalError(`Failed to update task: ${message}`);
		}
	}
}
