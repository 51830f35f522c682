/**
 * Central export point for all types
 */

// Flashcard types
export type {
    Flashcard,
    GenerationRequest,
    GenerationError,
    GenerationSuccess,
    GenerationFailure,
    GenerationResult,
    ExportPaths,
} from "./flashcard.types";

// Provider types
export type {
    ProviderName,
    GenerationProvider,
    ModelClientOptions,
    ProviderSettings,
} from "./api.types";

// Generation state types
export type {
    GenerationStatus,
    GenerationState,
} from "./state.types";
