/**
 * AI integration: prompt, providers and the client that calls them
 */
export { buildFlashcardPrompt } from "./flashcard-prompt";
export { ModelClient } from "./model-client.service";
export {
    createProvider,
    GeminiProvider,
    OpenRouterProvider,
    extractMessageText,
} from "./providers";
