/**
 * Flashcard Generator
 * Runs one generation request: validate, prompt, call the model, decode
 */
import { buildFlashcardPrompt } from "../ai/flashcard-prompt";
import type { ModelClient } from "../ai/model-client.service";
import { decodeFlashcards } from "./flashcard-decoder.service";
import {
    ConfigurationError,
    DecodeError,
    ProviderError,
    ValidationError,
} from "../../errors";
import type { GenerationError, GenerationRequest, GenerationResult } from "../../types";
import { safeValidateGenerationRequest } from "../../validation";

function isGenerationError(error: unknown): error is GenerationError {
    return (
        error instanceof ValidationError ||
        error instanceof ConfigurationError ||
        error instanceof ProviderError ||
        error instanceof DecodeError
    );
}

/**
 * Single linear attempt per request; no retries here and nothing cached
 */
export class FlashcardGeneratorService {
    constructor(
        private readonly client: ModelClient,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Generate flashcards for a request
     *
     * Expected failures come back as `{ success: false }`; anything else is a bug and is rethrown.
     */
    async generate(request: GenerationRequest): Promise<GenerationResult> {
        const validation = safeValidateGenerationRequest(request);
        if (!validation.success) {
            return { success: false, error: validation.error };
        }

        const { sourceText, cardCount } = validation.data;

        try {
            const prompt = buildFlashcardPrompt(sourceText, cardCount);
            const rawText = await this.client.complete(prompt);
            const flashcards = decodeFlashcards(rawText);

            if (flashcards.length !== cardCount) {
                console.warn(
                    `[FlashcardGenerator] Requested ${cardCount} flashcards, ${this.client.providerName} returned ${flashcards.length}`
                );
            }

            return {
                success: true,
                flashcards,
                requestedCount: cardCount,
                generatedAt: this.now(),
            };
        } catch (error) {
            if (isGenerationError(error)) {
                console.error(`[FlashcardGenerator] ${error.name}:`, error.message);
                return { success: false, error };
            }
            throw error;
        }
    }
}
