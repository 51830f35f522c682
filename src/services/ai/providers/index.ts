/**
 * Provider factory
 */
import { GeminiProvider } from "./gemini.provider";
import { OpenRouterProvider } from "./openrouter.provider";
import type { AppConfig } from "../../../config";
import type { GenerationProvider } from "../../../types";

export { GeminiProvider } from "./gemini.provider";
export { OpenRouterProvider, extractMessageText } from "./openrouter.provider";

/**
 * Create the provider selected by the configuration
 */
export function createProvider(config: AppConfig): GenerationProvider {
    const settings = {
        apiKey: config.apiKey,
        model: config.model,
        temperature: config.temperature,
    };

    switch (config.provider) {
        case "gemini":
            return new GeminiProvider(settings);
        case "openrouter":
            return new OpenRouterProvider(settings);
    }
}
