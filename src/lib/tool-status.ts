export type ToolStatusOptions = {
	delayMs?: number;
	messages?: Record<string, string>;
};

const DEFAULT_STATUS_MESSAGES: Record<string, string> = {
	get_weather: "Checking the weather…",
	web_search: "Searching the web…",
};

export function createToolStatusHandler(
	sendReply: (message: string) => Promise<void> | void,
	options: ToolStatusOptions = {},
) {
	const delayMs = options.delayMs ?? 1500;
	const messages = options.messages ?? DEFAULT_STATUS_MESSAGES;
	const toolStatusSent = new Set<string>();
	const toolStatusTimers = new Map<string, ReturnType<typeof setTimeout>>();

	const scheduleStatus = (key: string, message: string) => {
		if (toolStatusSent.has(key) || toolStatusTimers.has(key)) return;
		const timer = setTimeout(() => {
			toolStatusSent.add(key);
			toolStatusTimers.delete(key);
			void sendReply(message);
		}, delayMs);
		toolStatusTimers.set(key, timer);
	};

	const clearStatus = (key: string) => {
		const timer = toolStatusTimers.get(key);
		if (timer) {
			clearTimeout(timer);
			toolStatusTimers.delete(key);
		}
	};

	const clearAllStatuses = () => {
		for (const key of Array.from(toolStatusTimers.keys())) {
			clearStatus(key);
		}
	};

	const onToolStep = (toolNames: string[]) => {
		for (const [key, message] of Object.entries(messages)) {
			if (toolNames.includes(key)) {
				scheduleStatus(key, message);
			} else {
				clearStatus(key);
			}
		}
	};

	return { onToolStep, clearAllStatuses };
}
