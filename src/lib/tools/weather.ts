import { tool } from "ai";
import { z } from "zod";
import { formatError } from "../errors.js";

export const WEATHER_UNITS = ["metric", "imperial", "standard"] as const;

export type WeatherUnit = (typeof WEATHER_UNITS)[number];

export type WeatherQuery = {
	location: string;
	unit?: WeatherUnit;
};

export type WeatherClientConfig = {
	apiKey: string;
	apiBaseUrl?: string;
	timeoutMs?: number;
	fetch?: typeof fetch;
};

export type WeatherClient = {
	fetchWeather: (query: WeatherQuery) => Promise<string>;
};

const TEMP_UNIT_LABELS: Record<WeatherUnit, string> = {
	metric: "°C",
	imperial: "°F",
	standard: "K",
};

const weatherResponseSchema = z.object({
	name: z.string(),
	main: z.object({
		temp: z.number(),
		feels_like: z.number(),
		humidity: z.number(),
	}),
	weather: z
		.array(z.object({ description: z.string() }))
		.min(1),
	wind: z.object({ speed: z.number() }),
	sys: z.object({ country: z.string() }),
});

export type WeatherResponse = z.infer<typeof weatherResponseSchema>;

function capitalize(text: string): string {
	if (!text) return text;
	return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

export function formatWeatherReport(
	data: WeatherResponse,
	unit: WeatherUnit,
): string {
	const tempUnit = TEMP_UNIT_LABELS[unit];
	const windUnit = unit === "imperial" ? "mph" : "m/s";
	const description = data.weather[0]?.description ?? "";
	return [
		`Weather in ${data.name}, ${data.sys.country}:`,
		`🌡️ Temperature: ${data.main.temp}${tempUnit} (feels like ${data.main.feels_like}${tempUnit})`,
		`☁️ Conditions: ${capitalize(description)}`,
		`💧 Humidity: ${data.main.humidity}%`,
		`💨 Wind Speed: ${data.wind.speed} ${windUnit}`,
	].join("\n");
}

function isAbortError(error: unknown) {
	return (
		error instanceof Error &&
		(error.name === "AbortError" || error.name === "TimeoutError")
	);
}

export function createWeatherClient(config: WeatherClientConfig): WeatherClient {
	const apiBaseUrl =
		config.apiBaseUrl ?? "https://api.openweathermap.org/data/2.5";
	const timeoutMs = config.timeoutMs ?? 10_000;
	const fetchImpl = config.fetch ?? fetch;

	async function fetchWeather(query: WeatherQuery): Promise<string> {
		const city = query.location.trim();
		const unit = query.unit ?? "metric";
		if (!city) return "Error: No location provided";

		const url = new URL(`${apiBaseUrl.replace(/\/+$/, "")}/weather`);
		url.searchParams.set("q", city);
		url.searchParams.set("appid", config.apiKey);
		url.searchParams.set("units", unit);

		const controller = new AbortController();
		const timeout = setTimeout(() => controller.abort(), timeoutMs);
		try {
			const response = await fetchImpl(url, { signal: controller.signal });
			if (response.status === 404) {
				return `Error: City '${city}' not found. Please check the spelling or try a different city.`;
			}
			if (response.status === 401) {
				return "Error: Invalid API key. Please check your OpenWeatherMap API key.";
			}
			if (!response.ok) {
				return `Error: Failed to fetch weather data (Status ${response.status})`;
			}
			const body: unknown = await response.json();
			const parsed = weatherResponseSchema.safeParse(body);
			if (!parsed.success) {
				const issue = parsed.error.issues[0];
				const field = issue ? issue.path.join(".") : "unknown";
				return `Error: Unexpected response format from weather API - missing key ${field}`;
			}
			return formatWeatherReport(parsed.data, unit);
		} catch (error) {
			if (isAbortError(error)) {
				return "Error: Request timed out. Please try again.";
			}
			return `Error: Network error occurred - ${formatError(error)}`;
		} finally {
			clearTimeout(timeout);
		}
	}

	return { fetchWeather };
}

export const WEATHER_TOOL_NAME = "get_weather";

export const WEATHER_TOOL_DESCRIPTION =
	"Fetch the current weather for a city (temperature, conditions, humidity, wind).";

export function createWeatherTool(
	client: WeatherClient,
	options: { needsApproval?: boolean } = {},
) {
	return tool({
		description: WEATHER_TOOL_DESCRIPTION,
		inputSchema: z.object({
			location: z
				.string()
				.describe('City name, e.g. "London", "New York", "Tokyo"'),
			unit: z
				.enum(WEATHER_UNITS)
				.default("metric")
				.describe(
					"metric (Celsius), imperial (Fahrenheit) or standard (Kelvin)",
				),
		}),
		needsApproval: options.needsApproval ?? false,
		execute: async ({ location, unit }) =>
			client.fetchWeather({ location, unit }),
	});
}
