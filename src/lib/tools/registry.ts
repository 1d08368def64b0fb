export type ToolSource = "core" | "web";

export type ToolMeta = {
	name: string;
	description?: string;
	source: ToolSource;
	origin?: string;
	needsApproval?: boolean;
};

const TOOL_NAME_ALIASES: Record<string, string> = {
	weather: "get_weather",
	"get-weather": "get_weather",
	"web-search": "web_search",
};

export function normalizeToolName(name: string): string {
	const normalized = name.trim().toLowerCase();
	return TOOL_NAME_ALIASES[normalized] ?? normalized;
}

/** One line per tool for the agent instructions. */
export function formatToolLines(tools: ReadonlyArray<ToolMeta>): string {
	return tools
		.map((meta) => {
			const desc = meta.description ? ` - ${meta.description}` : "";
			const confirm = meta.needsApproval ? " (needs user confirmation)" : "";
			return `${meta.name}${desc}${confirm}`;
		})
		.join("\n");
}
