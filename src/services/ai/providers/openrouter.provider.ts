/**
 * OpenRouter provider
 * OpenRouter speaks the OpenAI chat API, so LangChain's ChatOpenAI drives it
 */
import { ChatOpenAI } from "@langchain/openai";
import { API_CONFIG, PROVIDERS } from "../../../constants";
import { ConfigurationError, ProviderError } from "../../../errors";
import type { GenerationProvider, ProviderSettings } from "../../../types";

/**
 * Flatten chat message content into plain text
 * Returns undefined when the message carries no text part at all
 */
export function extractMessageText(content: unknown): string | undefined {
    if (typeof content === "string") {
        return content;
    }
    if (!Array.isArray(content)) {
        return undefined;
    }

    const parts: string[] = [];
    for (const part of content) {
        if (typeof part === "string") {
            parts.push(part);
        } else if (typeof part === "object" && part !== null && "text" in part && typeof part.text === "string") {
            parts.push(part.text);
        }
    }
    return parts.length > 0 ? parts.join("") : undefined;
}

export class OpenRouterProvider implements GenerationProvider {
    readonly name = PROVIDERS.openrouter.label;
    private readonly llm: ChatOpenAI | null;

    constructor(settings: ProviderSettings) {
        this.llm = settings.apiKey.trim()
            ? new ChatOpenAI({
                model: settings.model,
                apiKey: settings.apiKey,
                temperature: settings.temperature,
                // ModelClient owns retries
                maxRetries: 0,
                configuration: {
                    baseURL: API_CONFIG.openRouterBaseUrl,
                    defaultHeaders: {
                        "X-Title": "Flashcard Forge",
                    },
                },
            })
            : null;
    }

    async generate(prompt: string, signal?: AbortSignal): Promise<string> {
        if (!this.llm) {
            throw new ConfigurationError(
                "OpenRouter API key not configured. Set it in your environment or .env file.",
                PROVIDERS.openrouter.apiKeyEnv
            );
        }

        const message = await this.llm.invoke(prompt, { signal });
        const text = extractMessageText(message.content);
        if (text === undefined) {
            throw new ProviderError(
                "OpenRouter response contained no text",
                "empty_response",
                undefined,
                this.name
            );
        }
        return text;
    }
}
