/**
 * Central export for all Zod schemas
 */

// Flashcard Schemas
export {
    FlashcardSchema,
    FlashcardBatchSchema,
    GenerationRequestSchema,
} from "./flashcard.schema";

// Configuration Schemas
export {
    ProviderNameSchema,
    EnvironmentSchema,
} from "./config.schema";
