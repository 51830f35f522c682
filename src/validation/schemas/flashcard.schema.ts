/**
 * Zod schemas for flashcard data structures
 */
import { z } from "zod";
import { GENERATION_LIMITS } from "../../constants";

// ===== Flashcard Schema =====

/**
 * Schema for a single flashcard as the model returns it
 * Values are trimmed; unknown keys are dropped
 */
export const FlashcardSchema = z.object({
    question: z.string().trim().min(1, "Question cannot be empty"),
    answer: z.string().trim().min(1, "Answer cannot be empty"),
});

/**
 * Schema for a whole generated batch
 */
export const FlashcardBatchSchema = z
    .array(FlashcardSchema)
    .min(1, "Response must contain at least one flashcard");

// ===== Generation Request Schema =====

/**
 * Schema for a user's generation request
 */
export const GenerationRequestSchema = z.object({
    // Counted in code points so emoji and other astral characters count once
    sourceText: z
        .string()
        .refine(
            (text) => [...text].length >= GENERATION_LIMITS.minSourceLength,
            `Please enter at least ${GENERATION_LIMITS.minSourceLength} characters of study material`
        ),
    cardCount: z
        .number()
        .int("Card count must be a whole number")
        .min(GENERATION_LIMITS.minCardCount, `Card count must be at least ${GENERATION_LIMITS.minCardCount}`)
        .max(GENERATION_LIMITS.maxCardCount, `Card count must be at most ${GENERATION_LIMITS.maxCardCount}`),
});
