export type LogLevel = "info" | "warn" | "error";

export type Logger = {
	info: (event: Record<string, unknown>) => void;
	warn: (event: Record<string, unknown>) => void;
	error: (event: Record<string, unknown>) => void;
	child: (fields: Record<string, unknown>) => Logger;
};

export type LogSink = (level: LogLevel, line: string) => void;

function stripUndefined<T extends Record<string, unknown>>(obj: T) {
	const cleaned: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (value !== undefined) cleaned[key] = value;
	}
	return cleaned;
}

function serializeValue(value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	return value;
}

const consoleSink: LogSink = (level, line) => {
	if (level === "error") {
		console.error(line);
		return;
	}
	if (level === "warn") {
		console.warn(line);
		return;
	}
	console.log(line);
};

export function createLogger(
	base: Record<string, unknown>,
	sink: LogSink = consoleSink,
): Logger {
	const baseFields = stripUndefined(base);
	const log = (level: LogLevel, event: Record<string, unknown>) => {
		const fields = stripUndefined(event);
		for (const [key, value] of Object.entries(fields)) {
			fields[key] = serializeValue(value);
		}
		const payload = {
			timestamp: new Date().toISOString(),
			level,
			...baseFields,
			...fields,
		};
		sink(level, JSON.stringify(payload));
	};

	return {
		info: (event) => log("info", event),
		warn: (event) => log("warn", event),
		error: (event) => log("error", event),
		child: (fields) => createLogger({ ...baseFields, ...fields }, sink),
	};
}

export function createDebugLogger(enabled: boolean, logger: Logger) {
	return (message: string, data?: Record<string, unknown>) => {
		if (!enabled) return;
		logger.info({ event: "debug", message, ...data });
	};
}
