import type { Context, Hono } from "hono";
import type { Envelope } from "../core/response";
import type { TaskRouter } from "./router";

function toResponse(envelope: Envelope): Response {
	return new Response(envelope.body === "" ? null : envelope.body, {
		status: envelope.statusCode,
		headers: envelope.headers,
	});
}

async function forward(
	c: Context,
	router: TaskRouter,
	template: string,
	pathParameters: Record<string, string | undefined> = {}
): Promise<Response> {
	const body = await c.req.text();
	const envelope = await router.dispatch({
		routeKey: `${c.req.method} ${template}`,
		pathParameters,
		queryParameters: c.req.query(),
		body: body === "" ? null : body,
	});
	return toResponse(envelope);
}

/**
 * Bind the task routes to a Hono app. Every method is forwarded so that
 * unsupported ones get the router's own "Route not found." envelope, and
 * unmatched paths go through the router as well.
 */
export function registerTaskRoutes(app: Hono, router: TaskRouter): void {
	app.all("/tasks", (c) => forward(c, router, "/tasks"));

	app.all("/tasks/:id", (c) => forward(c, router, "/tasks/{id}", { id: c.req.param("id") }));

	app.notFound((c) => forward(c, router, c.req.path));
}
