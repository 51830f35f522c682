/**
 * Validators for flashcard data structures
 */
import {
    FlashcardBatchSchema,
    GenerationRequestSchema,
} from "./schemas/flashcard.schema";
import { describeIssues } from "./zod-issues";
import type { Flashcard, GenerationRequest } from "../types";
import { DecodeError, ValidationError } from "../errors";

/**
 * Result of validation - either success with data or failure with error
 */
export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; error: ValidationError };

/**
 * Validates a parsed model reply as a batch of flashcards
 *
 * @param data - Parsed JSON from the model
 * @param rawText - The text it was parsed from, kept on the error
 * @throws DecodeError if any element is missing a non-empty question or answer
 */
export function validateFlashcardBatch(data: unknown, rawText: string): Flashcard[] {
    const result = FlashcardBatchSchema.safeParse(data);

    if (!result.success) {
        const errors = describeIssues(result.error);
        throw new DecodeError(
            `Invalid flashcards: ${errors.join(", ")}`,
            rawText,
            errors
        );
    }

    return result.data;
}

/**
 * Validates a generation request before anything is sent to a provider
 *
 * @throws ValidationError naming the first offending field
 */
export function validateGenerationRequest(data: unknown): GenerationRequest {
    const result = GenerationRequestSchema.safeParse(data);

    if (!result.success) {
        const errors = describeIssues(result.error);
        const field = result.error.issues[0]?.path.map(String).join(".");
        throw new ValidationError(
            result.error.issues[0]?.message ?? "Invalid request",
            field || undefined,
            errors
        );
    }

    return Object.freeze({
        sourceText: result.data.sourceText,
        cardCount: result.data.cardCount,
    });
}

/**
 * Safely validates a generation request without throwing
 */
export function safeValidateGenerationRequest(
    data: unknown
): ValidationResult<GenerationRequest> {
    try {
        return { success: true, data: validateGenerationRequest(data) };
    } catch (error) {
        if (error instanceof ValidationError) {
            return { success: false, error };
        }
        throw error;
    }
}
