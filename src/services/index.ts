/**
 * Central export for all services
 *
 * Services are organized by domain:
 * - ai: prompt template, providers and the model client
 * - flashcard: response decoding and the generation pipeline
 * - export: CSV / JSON files
 * - ui: terminal notifications
 */

// AI services
export {
	buildFlashcardPrompt,
	ModelClient,
	createProvider,
	GeminiProvider,
	OpenRouterProvider,
} from "./ai";

// Flashcard services
export { decodeFlashcards } from "./flashcard/flashcard-decoder.service";
export { FlashcardGeneratorService } from "./flashcard/flashcard-generator.service";

// Export services
export {
	FlashcardExportService,
	toCsv,
	toJson,
	escapeCsvField,
	buildExportBaseName,
} from "./export/flashcard-export.service";

// UI services
export {
	NotificationService,
	type OutputStream,
} from "./ui/notification.service";
