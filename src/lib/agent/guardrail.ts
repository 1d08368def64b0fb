import { generateText, type LanguageModel, type ModelMessage, Output } from "ai";
import { z } from "zod";

export const GUARDRAIL_INSTRUCTIONS =
	"Check if the user is asking about weather information.";

const weatherVerdictSchema = z.object({
	is_weather: z.boolean(),
	reasoning: z.string(),
});

export type WeatherVerdict = z.infer<typeof weatherVerdictSchema>;

/** Classifies the incoming message before the agent sees it. */
export type InputGuardrail = {
	check: (messages: ModelMessage[]) => Promise<WeatherVerdict>;
};

export function refusalMessage(firstName?: string): string {
	return `I'm sorry ${firstName?.trim() || "there"}, I can't help with that. Please ask me about something else.`;
}

export function createWeatherGuardrail(model: LanguageModel): InputGuardrail {
	return {
		check: async (messages) => {
			const result = await generateText({
				model,
				system: GUARDRAIL_INSTRUCTIONS,
				messages,
				output: Output.object({ schema: weatherVerdictSchema }),
			});
			return result.output;
		},
	};
}
