export type AppErrorCode =
	| "unauthorized"
	| "enqueue_failed"
	| "processing_failed"
	| "delivery_failed"
	| "approval_conflict"
	| "missing_env";

export class AppError extends Error {
	readonly code: AppErrorCode;

	constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

export class AuthorizationError extends AppError {
	readonly reason: string;

	constructor(reason: string) {
		super("unauthorized", `Webhook request rejected: ${reason}`);
		this.reason = reason;
	}
}

export class EnqueueError extends AppError {
	constructor(cause: unknown) {
		super("enqueue_failed", `Failed to enqueue update: ${formatError(cause)}`, {
			cause,
		});
	}
}

export class ProcessingError extends AppError {
	readonly chatId: string;

	constructor(chatId: string, cause: unknown) {
		super(
			"processing_failed",
			`Failed to process update for chat ${chatId}: ${formatError(cause)}`,
			{ cause },
		);
		this.chatId = chatId;
	}
}

export class DeliveryError extends AppError {
	readonly chatId: string;

	constructor(chatId: string, cause: unknown) {
		super(
			"delivery_failed",
			`Failed to deliver message to chat ${chatId}: ${formatError(cause)}`,
			{ cause },
		);
		this.chatId = chatId;
	}
}

export class ApprovalConflictError extends AppError {
	readonly chatId: string;

	constructor(chatId: string) {
		super(
			"approval_conflict",
			`Chat ${chatId} already has a pending approval`,
		);
		this.chatId = chatId;
	}
}

export class MissingEnvError extends AppError {
	readonly missing: string[];

	constructor(missing: string[]) {
		super("missing_env", `Missing required env: ${missing.join(", ")}`);
		this.missing = missing;
	}
}

export function formatError(error: unknown): string {
	if (typeof error === "string") return error;
	if (error instanceof Error) return error.message;
	if (error && typeof error === "object" && "message" in error) {
		return String(error.message);
	}
	return String(error);
}
