import { describe, expect, it, vi } from "vitest";
import { EnqueueError } from "../src/lib/errors.js";
import type { UpdateProcessor } from "../src/lib/processor.js";
import {
	createBullUpdateQueue,
	PROCESS_UPDATE_JOB,
	UPDATE_JOB_OPTIONS,
	UPDATES_QUEUE_NAME,
} from "../src/lib/queue/updates-queue.js";
import { createUpdateJobHandler } from "../src/lib/queue/worker.js";
import { createMemoryLogger, textUpdate } from "./support/fakes.js";

const bull = vi.hoisted(() => ({
	add: vi.fn(),
	names: new Array<string>(),
}));

vi.mock("bullmq", () => ({
	Queue: class {
		add = bull.add;
		close = async () => undefined;
		constructor(name: string) {
			bull.names.push(name);
		}
	},
	Worker: class {},
}));

describe("bull update queue", () => {
	it("adds a single-attempt job per update", async () => {
		bull.add.mockResolvedValueOnce({ id: "17" });
		const queue = createBullUpdateQueue({ host: "localhost", port: 6379 });
		const update = textUpdate("hi");

		expect(await queue.enqueue(update)).toBe("17");
		expect(bull.names).toContain(UPDATES_QUEUE_NAME);
		expect(bull.add).toHaveBeenCalledWith(
			PROCESS_UPDATE_JOB,
			{ update },
			UPDATE_JOB_OPTIONS,
		);
		expect(UPDATE_JOB_OPTIONS.attempts).toBe(1);
	});

	it("wraps broker failures", async () => {
		bull.add.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
		const queue = createBullUpdateQueue({ host: "localhost", port: 6379 });

		const error = await queue.enqueue(textUpdate("hi")).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(EnqueueError);
		expect(error).toMatchObject({
			code: "enqueue_failed",
			message: "Failed to enqueue update: connect ECONNREFUSED",
		});
	});
});

describe("update job handler", () => {
	it("hands the update to the processor and logs completion", async () => {
		const processUpdate = vi.fn<UpdateProcessor["process"]>(async () => undefined);
		const { logger, records } = createMemoryLogger();
		const handler = createUpdateJobHandler({ process: processUpdate }, logger);
		const update = textUpdate("hi");

		await handler({ id: "5", data: { update } });

		expect(processUpdate).toHaveBeenCalledWith(update);
		expect(records[0]).toMatchObject({
			event: "update_processed",
			job_id: "5",
			update_id: update.update_id,
		});
	});
});
