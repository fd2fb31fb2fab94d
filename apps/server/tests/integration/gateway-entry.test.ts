import { describe, it, expect } from "vitest";
import { createGatewayEntry } from "@/gateway";

describe("Gateway entry", () => {
	it("should build its store from the environment once and keep records across events", async () => {
		const handle = createGatewayEntry({ STORE_DRIVER: "memory", LOG_LEVEL: "error" });

		const created = await handle({
			routeKey: "POST /tasks",
			body: JSON.stringify({ title: "Buy milk", date: "2025-12-04" }),
		});
		const listed = await handle({ routeKey: "GET /tasks", queryStringParameters: null });

		expect(created.statusCode).toBe(201);
		const task = JSON.parse(created.body);
		expect(listed.statusCode).toBe(200);
		expect(JSON.parse(listed.body)).toEqual([task]);
	});

	it("should answer unknown routes with 404", async () => {
		const handle = createGatewayEntry({ STORE_DRIVER: "memory", LOG_LEVEL: "error" });

		const response = await handle({ routeKey: "PATCH /tasks" });

		expect(response.statusCode).toBe(404);
		expect(JSON.parse(response.body)).toEqual({ message: "Route not found." });
	});
});
