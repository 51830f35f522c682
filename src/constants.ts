import type { ProviderName } from "./types";

// ===== Generation Limits =====

/** Bounds a generation request must respect */
export const GENERATION_LIMITS = {
	minSourceLength: 50,
	minCardCount: 1,
	maxCardCount: 200,
	defaultCardCount: 10,
} as const;

// ===== Providers =====

/** Text-generation backends and their default models */
export const PROVIDERS: Record<
	ProviderName,
	{ label: string; defaultModel: string; apiKeyEnv: string }
> = {
	gemini: {
		label: "Gemini",
		defaultModel: "gemini-2.5-flash",
		apiKeyEnv: "GOOGLE_API_KEY",
	},
	openrouter: {
		label: "OpenRouter",
		defaultModel: "google/gemini-2.5-flash",
		apiKeyEnv: "OPENROUTER_API_KEY",
	},
};

/** Request defaults shared by every provider */
export const API_CONFIG = {
	openRouterBaseUrl: "https://openrouter.ai/api/v1",
	defaultTemperature: 0.7,
	timeoutMs: 60_000,
	retryAttempts: 0,
	maxRetryAttempts: 5,
	retryDelayMs: 1000,
} as const;

// ===== Export =====

export const EXPORT_CONFIG = {
	outputDir: "flashcards",
	filePrefix: "flashcards_",
	csvColumns: ["question", "answer"],
	jsonIndent: 2,
} as const;

// ===== Display =====

export const DISPLAY_CONFIG = {
	// Characters of the question shown in a list heading
	questionPreviewLength: 60,
} as const;

/** Loaded by `--sample` */
export const SAMPLE_TEXT = `Photosynthesis is the process plants, algae and some bacteria use to turn light energy into chemical energy.
It takes place mostly in the chloroplasts, where the pigment chlorophyll absorbs red and blue light.
The light-dependent reactions split water, release oxygen and produce ATP and NADPH.
The Calvin cycle then uses that ATP and NADPH to fix carbon dioxide into glucose.
Factors such as light intensity, carbon dioxide concentration and temperature limit the rate of photosynthesis.`;
