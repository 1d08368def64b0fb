import { type ConnectionOptions, type Job, Worker } from "bullmq";
import type { Logger } from "../logger.js";
import type { UpdateProcessor } from "../processor.js";
import { UPDATES_QUEUE_NAME, type UpdateJobData } from "./updates-queue.js";

export type UpdateJobHandler = (job: Pick<Job<UpdateJobData>, "id" | "data">) => Promise<void>;

export function createUpdateJobHandler(
	processor: UpdateProcessor,
	logger: Logger,
): UpdateJobHandler {
	return async (job) => {
		const startedAt = Date.now();
		await processor.process(job.data.update);
		logger.info({
			event: "update_processed",
			job_id: job.id,
			update_id: job.data.update.update_id,
			duration_ms: Date.now() - startedAt,
		});
	};
}

export function createUpdatesWorker(params: {
	connection: ConnectionOptions;
	processor: UpdateProcessor;
	concurrency: number;
	logger: Logger;
}): Worker<UpdateJobData> {
	const handler = createUpdateJobHandler(params.processor, params.logger);
	const worker = new Worker<UpdateJobData>(UPDATES_QUEUE_NAME, handler, {
		connection: params.connection,
		concurrency: params.concurrency,
	});
	worker.on("failed", (job, error) => {
		params.logger.error({
			event: "job_failed",
			job_id: job?.id,
			error,
		});
	});
	worker.on("error", (error) => {
		params.logger.error({ event: "worker_error", error });
	});
	return worker;
}
