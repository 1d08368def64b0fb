import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

const modelConfigSchema = z.object({
	provider: z.string(),
	id: z.string(),
	label: z.string().optional(),
});

const modelsFileSchema = z.object({
	defaults: z.object({
		primary: z.string(),
	}),
	models: z.record(z.string(), modelConfigSchema),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

export type ModelsFile = z.infer<typeof modelsFileSchema>;

export type SelectedModel = {
	ref: string;
	config: ModelConfig;
};

const OPENAI_PREFIX = "openai/";

export function normalizeModelRef(input: string): string {
	const trimmed = input.trim();
	if (!trimmed) return trimmed;
	if (trimmed.includes("/")) return trimmed;
	return `${OPENAI_PREFIX}${trimmed}`;
}

export function parseModelsConfig(raw: unknown): ModelsFile {
	return modelsFileSchema.parse(raw);
}

export async function loadModelsConfig(
	configPath = "config/models.json",
): Promise<ModelsFile> {
	const fullPath = path.resolve(configPath);
	const raw = await fs.readFile(fullPath, "utf8");
	return parseModelsConfig(JSON.parse(raw));
}

export function selectModel(
	models: ModelsFile,
	overrideRef?: string | null,
): SelectedModel {
	const primary = normalizeModelRef(
		overrideRef && overrideRef.trim().length > 0
			? overrideRef
			: models.defaults.primary,
	);
	const config = models.models[primary];
	if (!config) {
		throw new Error(`Unknown model: ${primary}`);
	}
	return { ref: primary, config };
}

export function selectModelOrDefault(
	models: ModelsFile,
	overrideRef: string,
	onUnknown?: (ref: string) => void,
): SelectedModel {
	try {
		return selectModel(models, overrideRef);
	} catch {
		// OpenAI ids missing from the catalogue go to the provider as given.
		const ref = normalizeModelRef(overrideRef);
		const id = ref.startsWith(OPENAI_PREFIX)
			? ref.slice(OPENAI_PREFIX.length).trim()
			: "";
		if (id) return { ref, config: { provider: "openai", id } };
		onUnknown?.(overrideRef);
		return selectModel(models, null);
	}
}
