import { describe, it, expect } from "vitest";
import { TaskNotFoundError } from "@/core/errors";
import { MemoryTaskStore } from "@/core/memory-task-store";
import { sampleTasks } from "../helpers/test-setup";

describe("Contract: MemoryTaskStore", () => {
	it("should return copies so callers cannot mutate stored records", async () => {
		const store = new MemoryTaskStore(sampleTasks);

		const record = await store.get("t-1");
		if (!record) throw new Error("expected t-1");
		record.title = "changed";

		expect((await store.get("t-1"))?.title).toBe("Buy milk");
	});

	it("should replace a record on put with the same id", async () => {
		const store = new MemoryTaskStore(sampleTasks);

		await store.put({ id: "t-1", title: "Buy bread", description: "", date: "2025-12-07" });

		expect(await store.get("t-1")).toEqual({ id: "t-1", title: "Buy bread", description: "", date: "2025-12-07" });
		expect(await store.scanAll()).toHaveLength(3);
	});

	it("should update only the given fields", async () => {
		const store = new MemoryTaskStore(sampleTasks);

		const updated = await store.updateFields("t-2", { description: "after 5pm" });

		expect(updated).toEqual({ id: "t-2", title: "Call plumber", description: "after 5pm", date: "2025-12-04" });
	});

	it("should throw TaskNotFoundError when updating a missing record", async () => {
		const store = new MemoryTaskStore();

		await expect(store.updateFields("ghost", { title: "X" })).rejects.toBeInstanceOf(TaskNotFoundError);
		expect(await store.get("ghost")).toBeNull();
	});

	it("should scan by literal date", async () => {
		const store = new MemoryTaskStore(sampleTasks);

		const matches = await store.scanByDate("2025-12-05");

		expect(matches.map((task) => task.id)).toEqual(["t-3"]);
	});

	it("should drop every record on close", async () => {
		const store = new MemoryTaskStore(sampleTasks);

		await store.close();

		expect(await store.scanAll()).toEqual([]);
	});
});
