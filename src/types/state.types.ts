/**
 * Generation state types
 */
import type { Flashcard, GenerationError, GenerationRequest } from "./flashcard.types";

// Lifecycle of a single user action
export type GenerationStatus = "idle" | "generating" | "success" | "error";

export interface GenerationState {
    status: GenerationStatus;
    request: GenerationRequest | null;
    flashcards: readonly Flashcard[];
    error: GenerationError | null;
    startedAt: number | null;
    finishedAt: number | null;
}
