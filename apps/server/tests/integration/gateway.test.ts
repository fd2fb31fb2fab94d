import { describe, it, expect } from "vitest";
import { createTaskHandlers } from "@/handlers/task";
import { createGatewayHandler, toTaskRequest } from "@/transports/gateway";
import { TaskRouter } from "@/transports/router";
import { setupTaskContext } from "../helpers/test-setup";

describe("Gateway events", () => {
	it("should normalize null parameter maps and bodies", () => {
		expect(
			toTaskRequest({
				routeKey: "GET /tasks",
				pathParameters: null,
				queryStringParameters: null,
				body: null,
			})
		).toEqual({
			routeKey: "GET /tasks",
			pathParameters: {},
			queryParameters: {},
			body: null,
		});
	});

	it("should decode base64 bodies", () => {
		const body = Buffer.from('{"title":"Buy milk"}', "utf8").toString("base64");

		expect(toTaskRequest({ routeKey: "POST /tasks", body, isBase64Encoded: true }).body).toBe(
			'{"title":"Buy milk"}'
		);
	});

	it("should answer an event without a route key with 404", async () => {
		const { ctx } = setupTaskContext();
		const handle = createGatewayHandler(new TaskRouter(createTaskHandlers(), ctx));

		const response = await handle({});

		expect(response.statusCode).toBe(404);
		expect(JSON.parse(response.body)).toEqual({ message: "Route not found." });
	});

	it("should run the task lifecycle", async () => {
		const { ctx } = setupTaskContext();
		const handle = createGatewayHandler(new TaskRouter(createTaskHandlers(), ctx));

		const created = await handle({
			routeKey: "POST /tasks",
			body: JSON.stringify({ title: "Buy milk", date: "2025-12-04" }),
		});
		expect(created.statusCode).toBe(201);
		const task = JSON.parse(created.body);
		expect(task).toEqual({ id: "task-1", title: "Buy milk", description: "", date: "2025-12-04" });

		const fetched = await handle({ routeKey: "GET /tasks/{id}", pathParameters: { id: task.id } });
		expect(fetched.statusCode).toBe(200);
		expect(JSON.parse(fetched.body)).toEqual(task);

		const updated = await handle({
			routeKey: "PUT /tasks/{id}",
			pathParameters: { id: task.id },
			body: JSON.stringify({ description: "2L" }),
		});
		expect(updated.statusCode).toBe(200);
		expect(JSON.parse(updated.body)).toEqual({ ...task, description: "2L" });

		const listed = await handle({ routeKey: "GET /tasks", queryStringParameters: { date: "2025-12-04" } });
		expect(listed.statusCode).toBe(200);
		expect(JSON.parse(listed.body)).toEqual([{ ...task, description: "2L" }]);

		const deleted = await handle({ routeKey: "DELETE /tasks/{id}", pathParameters: { id: task.id } });
		expect(deleted.statusCode).toBe(204);
		expect(deleted.body).toBe("");

		const gone = await handle({ routeKey: "GET /tasks/{id}", pathParameters: { id: task.id } });
		expect(gone.statusCode).toBe(404);
	});
});
