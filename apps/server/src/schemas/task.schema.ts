import { z } from "zod";

// Stored record: every field is a string in the store
export const task = z.object({
	id: z.string().min(1),
	title: z.string(),
	description: z.string(),
	date: z.string(), // YYYY-MM-DD by convention, never parsed
});

// task.create
export const taskCreateInput = z.object({
	title: z.string().min(1),
	// Falsy descriptions become "", other non-strings are stringified
	description: z.unknown().transform((value) => {
		if (!value) return "";
		return typeof value === "string" ? value : JSON.stringify(value);
	}),
	date: z.string().min(1),
});

// task.update - presence of a key decides inclusion, empty strings are applied
export const TASK_UPDATABLE_FIELDS = ["title", "description", "date"] as const;

export const taskUpdateFields = z.object({
	title: z.string().optional(),
	description: z.string().optional(),
	date: z.string().optional(),
});

export type Task = z.infer<typeof task>;
export type TaskUpdateFields = z.infer<typeof taskUpdateFields>;
