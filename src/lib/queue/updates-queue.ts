import { type ConnectionOptions, type JobsOptions, Queue } from "bullmq";
import type { Update } from "grammy/types";
import { EnqueueError } from "../errors.js";

export const UPDATES_QUEUE_NAME = "telegram-updates";
export const PROCESS_UPDATE_JOB = "process-update";

export type UpdateJobData = { update: Update };

export type UpdateQueue = {
	/** Resolves with the job id. */
	enqueue: (update: Update) => Promise<string>;
	close: () => Promise<void>;
};

export const UPDATE_JOB_OPTIONS: JobsOptions = {
	attempts: 1,
	removeOnComplete: 1000,
	removeOnFail: 5000,
};

export function createBullUpdateQueue(
	connection: ConnectionOptions,
): UpdateQueue {
	const queue = new Queue<UpdateJobData>(UPDATES_QUEUE_NAME, { connection });

	return {
		enqueue: async (update) => {
			try {
				const job = await queue.add(
					PROCESS_UPDATE_JOB,
					{ update },
					UPDATE_JOB_OPTIONS,
				);
				return job.id ?? "";
			} catch (error) {
				throw new EnqueueError(error);
			}
		},
		close: () => queue.close(),
	};
}
