/**
 * Central export for all validators
 */

// Flashcard Validators
export {
    validateFlashcardBatch,
    validateGenerationRequest,
    safeValidateGenerationRequest,
    type ValidationResult,
} from "./flashcard.validator";

export { describeIssues } from "./zod-issues";

// Re-export schemas and their types
export * from "./schemas";
