/**
 * Gemini provider
 * Calls Google's Gemini models through the @google/genai SDK
 */
import { GoogleGenAI } from "@google/genai";
import { PROVIDERS } from "../../../constants";
import { ConfigurationError, ProviderError } from "../../../errors";
import type { GenerationProvider, ProviderSettings } from "../../../types";

export class GeminiProvider implements GenerationProvider {
    readonly name = PROVIDERS.gemini.label;
    private readonly ai: GoogleGenAI | null;

    constructor(private readonly settings: ProviderSettings) {
        this.ai = settings.apiKey.trim()
            ? new GoogleGenAI({ apiKey: settings.apiKey })
            : null;
    }

    async generate(prompt: string, signal?: AbortSignal): Promise<string> {
        if (!this.ai) {
            throw new ConfigurationError(
                "Gemini API key not configured. Set it in your environment or .env file.",
                PROVIDERS.gemini.apiKeyEnv
            );
        }

        const response = await this.ai.models.generateContent({
            model: this.settings.model,
            contents: prompt,
            config: {
                temperature: this.settings.temperature,
                responseMimeType: "application/json",
                abortSignal: signal,
            },
        });

        // `text` is a getter; undefined when no candidate carries text
        const text = response.text;
        if (text === undefined) {
            throw new ProviderError(
                "Gemini response contained no text",
                "empty_response",
                undefined,
                this.name
            );
        }
        return text;
    }
}
