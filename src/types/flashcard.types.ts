/**
 * Flashcard-related types
 */
import type {
    ConfigurationError,
    DecodeError,
    ProviderError,
    ValidationError,
} from "../errors";

// Single question/answer pair, in generation order within a batch
export interface Flashcard {
    readonly question: string;
    readonly answer: string;
}

// One user action: the text to study and how many cards to ask for
export interface GenerationRequest {
    readonly sourceText: string;
    readonly cardCount: number;
}

// Everything the pipeline can fail with
export type GenerationError =
    | ValidationError
    | ConfigurationError
    | ProviderError
    | DecodeError;

export interface GenerationSuccess {
    success: true;
    flashcards: readonly Flashcard[];
    requestedCount: number;
    generatedAt: Date;
}

export interface GenerationFailure {
    success: false;
    error: GenerationError;
}

// Either the whole batch decodes or the request fails
export type GenerationResult = GenerationSuccess | GenerationFailure;

// Where an export landed on disk
export interface ExportPaths {
    csvPath: string;
    jsonPath: string;
}
