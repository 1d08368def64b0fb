import { buildSystemPrompt } from "./system-prompt.js";

export type AgentInstructionOptions = {
	modelRef: string;
	modelName: string;
	toolLines: string;
	userName?: string;
	currentDateTime?: string;
};

export function buildAgentInstructions(
	options: AgentInstructionOptions,
): string {
	return [
		buildSystemPrompt({
			modelRef: options.modelRef,
			modelName: options.modelName,
		}),
		"",
		"Tool Use:",
		"- Call get_weather with the city name and the unit system the user expects (metric by default).",
		"- If a tool returns a line starting with `Error:`, explain the problem to the user instead of retrying blindly.",
		"- Some tools need the user's confirmation first; the chat will ask them. Do not ask again yourself.",
		"",
		"Available tools:",
		options.toolLines || "(none)",
		"",
		options.userName ? `User first name: ${options.userName}` : "",
		options.currentDateTime ? `Current time: ${options.currentDateTime}` : "",
	]
		.filter((line, index, lines) => line !== "" || lines[index - 1] !== "")
		.join("\n")
		.trimEnd();
}
