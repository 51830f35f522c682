/**
 * Terminal front end for one generation request
 */
import { resolveSourceText, type InputSources } from "./input";
import type { CliOptions } from "./args";
import { FileError, ValidationError, getErrorMessage } from "../errors";
import type { FlashcardExportService } from "../services/export/flashcard-export.service";
import type { FlashcardGeneratorService } from "../services/flashcard/flashcard-generator.service";
import type { NotificationService } from "../services/ui/notification.service";
import type { GenerationStateManager } from "../state";
import { renderFlashcardList } from "../ui/flashcard-list.renderer";
import { safeValidateGenerationRequest } from "../validation";

export const EXIT_CODES = {
    success: 0,
    failure: 1,
    usage: 2,
} as const;

export interface CliDependencies {
    generator: FlashcardGeneratorService;
    exporter: FlashcardExportService;
    notifier: NotificationService;
    state: GenerationStateManager;
    input: InputSources;
}

/**
 * Read input, generate, list the cards and export them
 * @returns Process exit code
 */
export async function runCli(options: CliOptions, deps: CliDependencies): Promise<number> {
    const { generator, exporter, notifier, state } = deps;

    let sourceText: string;
    try {
        sourceText = await resolveSourceText(options, deps.input);
    } catch (error) {
        if (error instanceof ValidationError) {
            notifier.warning(error.message);
            return EXIT_CODES.usage;
        }
        if (error instanceof FileError) {
            notifier.error(error.toUserMessage(), error.cause);
            return EXIT_CODES.failure;
        }
        throw error;
    }

    // Rejected requests never reach the provider
    const validation = safeValidateGenerationRequest({ sourceText, cardCount: options.count });
    if (!validation.success) {
        notifier.warning(validation.error.message);
        return EXIT_CODES.usage;
    }
    const request = validation.data;

    const unsubscribe = state.subscribeToSelector(
        (s) => s.status,
        (status) => {
            if (status === "generating") {
                notifier.progress(request.cardCount);
            }
        }
    );

    state.start(request);
    const result = await generator.generate(request);
    state.complete(result);
    unsubscribe();

    if (!result.success) {
        notifier.generationFailed(result.error);
        return EXIT_CODES.failure;
    }

    notifier.flashcardsGenerated(result.flashcards.length);
    notifier.print("");
    notifier.print(renderFlashcardList(result.flashcards));
    notifier.print("");

    if (!options.save) {
        return EXIT_CODES.success;
    }

    try {
        const paths = await exporter.save(result.flashcards, result.generatedAt);
        notifier.filesSaved(paths, exporter.directory);
    } catch (error) {
        if (error instanceof FileError) {
            notifier.error(getErrorMessage(error), error.cause);
            return EXIT_CODES.failure;
        }
        throw error;
    }

    return EXIT_CODES.success;
}
