import type { Envelope } from "../core/response";
import type { TaskRequest, TaskRouter } from "./router";

/**
 * API-gateway style event: the route is already resolved to a
 * `"METHOD /template"` key and parameter maps may be null.
 */
export interface GatewayEvent {
	routeKey?: string;
	pathParameters?: Record<string, string | undefined> | null;
	queryStringParameters?: Record<string, string | undefined> | null;
	body?: string | null;
	isBase64Encoded?: boolean;
}

export function toTaskRequest(event: GatewayEvent): TaskRequest {
	let body = event.body ?? null;
	if (body !== null && event.isBase64Encoded) {
		body = Buffer.from(body, "base64").toString("utf8");
	}

	return {
		routeKey: event.routeKey ?? "",
		pathParameters: event.pathParameters ?? {},
		queryParameters: event.queryStringParameters ?? {},
		body,
	};
}

export function createGatewayHandler(router: TaskRouter): (event: GatewayEvent) => Promise<Envelope> {
	return (event) => router.dispatch(toTaskRequest(event));
}
