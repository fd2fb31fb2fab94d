import { z } from "zod";
import type { TaskContext } from "../core/context";
import { errorMessage } from "../core/errors";
import { badRequest, internalError, notFound } from "../core/response";
import type { Envelope } from "../core/response";
import type { TaskHandlers } from "../handlers/task";

/**
 * Transport-neutral request as handed to the router.
 * `routeKey` is `"METHOD /template"`, e.g. `"GET /tasks/{id}"`.
 */
export interface TaskRequest {
	routeKey: string;
	pathParameters: Record<string, string | undefined>;
	queryParameters: Record<string, string | undefined>;
	body: string | null;
}

export type Route =
	| { kind: "task.create" }
	| { kind: "task.list" }
	| { kind: "task.get" }
	| { kind: "task.update" }
	| { kind: "task.delete" };

export type RouteKind = Route["kind"];

const ROUTES: ReadonlyMap<string, RouteKind> = new Map<string, RouteKind>([
	["POST /tasks", "task.create"],
	["GET /tasks", "task.list"],
	["GET /tasks/{id}", "task.get"],
	["PUT /tasks/{id}", "task.update"],
	["DELETE /tasks/{id}", "task.delete"],
]);

/**
 * Resolve a route key to one of the task routes, or `null` when nothing matches.
 * The method is matched case-insensitively, the path template exactly.
 */
export function parseRoute(routeKey: string): Route | null {
	const match = /^\s*(\S+)\s+(\S+)\s*$/.exec(routeKey);
	if (!match) return null;

	const kind = ROUTES.get(`${match[1].toUpperCase()} ${match[2]}`);
	return kind ? { kind } : null;
}

const jsonObject = z.record(z.string(), z.unknown());

/**
 * Body parsing policy: anything that is not a JSON object (no body, an empty
 * string, malformed JSON, arrays, scalars) is read as "no fields given".
 */
export function parseBody(raw: string | null | undefined): Record<string, unknown> {
	if (!raw) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return {};
	}

	const fields = jsonObject.safeParse(parsed);
	return fields.success ? fields.data : {};
}

function assertNever(route: never): never {
	throw new Error(`Unhandled route: ${JSON.stringify(route)}`);
}

export class TaskRouter {
	constructor(
		private readonly handlers: TaskHandlers,
		private readonly ctx: TaskContext
	) {}

	/**
	 * Dispatch one request. Never rejects: unexpected failures become a 500
	 * envelope carrying the failure's message.
	 */
	async dispatch(request: TaskRequest): Promise<Envelope> {
		const logger = this.ctx.logger;
		logger.info(`Received ${request.routeKey}`, {
			pathParameters: request.pathParameters,
			queryParameters: request.queryParameters,
		});

		try {
			const route = parseRoute(request.routeKey);
			if (!route) {
				return notFound("Route not found.");
			}
			return await this.route(route, request);
		} catch (error) {
			const message = errorMessage(error);
			logger.error(`Error handling ${request.routeKey}: ${message}`);
			return internalError(`Internal error: ${message}`);
		}
	}

	private async route(route: Route, request: TaskRequest): Promise<Envelope> {
		const { handlers, ctx } = this;

		switch (route.kind) {
			case "task.create":
				return handlers.create.handle({ body: parseBody(request.body) }, ctx);

			case "task.list":
				return handlers.list.handle({ query: request.queryParameters }, ctx);

			case "task.get": {
				const id = request.pathParameters.id;
				if (!id) return badRequest("Path parameter 'id' is required.");
				return handlers.get.handle({ id }, ctx);
			}

			case "task.update": {
				const id = request.pathParameters.id;
				if (!id) return badRequest("Path parameter 'id' is required.");
				return handlers.update.handle({ id, body: parseBody(request.body) }, ctx);
			}

			case "task.delete": {
				const id = request.pathParameters.id;
				if (!id) return badRequest("Path parameter 'id' is required.");
				return handlers.delete.handle({ id }, ctx);
			}

			default:
				return assertNever(route);
		}
	}
}
