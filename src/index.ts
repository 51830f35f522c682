/**
 * Flashcard Forge public API
 */
export * from "./types";
export * from "./errors";
export { loadConfig, type AppConfig, type ConfigOverrides } from "./config";
export {
    GENERATION_LIMITS,
    PROVIDERS,
    EXPORT_CONFIG,
    SAMPLE_TEXT,
} from "./constants";
export * from "./services";
export { GenerationStateManager } from "./state";
export { renderFlashcardList, previewQuestion } from "./ui/flashcard-list.renderer";
export { stripCodeFence, type FenceStripResult } from "./utils";
export {
    validateGenerationRequest,
    validateFlashcardBatch,
    FlashcardSchema,
    FlashcardBatchSchema,
    GenerationRequestSchema,
} from "./validation";
