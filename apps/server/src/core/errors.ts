/**
 * Failure raised by a record store while talking to its backend.
 */
export class TaskStoreError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TaskStoreError";
	}
}

/**
 * Raised by `updateFields` when no record exists under the given id.
 */
export class TaskNotFoundError extends TaskStoreError {
	constructor(readonly taskId: string) {
		super("Task not found");
		this.name = "TaskNotFoundError";
	}
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return String(error);
}
