import { TaskCreateHandler } from "./task.create.handler";
import { TaskDeleteHandler } from "./task.delete.handler";
import { TaskGetHandler } from "./task.get.handler";
import { TaskListHandler } from "./task.list.handler";
import { TaskUpdateHandler } from "./task.update.handler";

export * from "./task.create.handler";
export * from "./task.get.handler";
export * from "./task.update.handler";
export * from "./task.delete.handler";
export * from "./task.list.handler";

export interface TaskHandlers {
	create: TaskCreateHandler;
	get: TaskGetHandler;
	update: TaskUpdateHandler;
	delete: TaskDeleteHandler;
	list: TaskListHandler;
}

export function createTaskHandlers(): TaskHandlers {
	return {
		create: new TaskCreateHandler(),
		get: new TaskGetHandler(),
		update: new TaskUpdateHandler(),
		delete: new TaskDeleteHandler(),
		list: new TaskListHandler(),
	};
}
