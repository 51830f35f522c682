#!/usr/bin/env node
/**
 * flashcard-forge command-line entry point
 */
import { config as loadDotenv } from "dotenv";
import { HELP_TEXT, parseCliArgs, type CliOptions } from "./cli/args";
import { createProcessInputSources } from "./cli/input";
import { EXIT_CODES, runCli } from "./cli/run";
import { loadConfig, type AppConfig } from "./config";
import { ConfigurationError, ValidationError } from "./errors";
import { FlashcardExportService } from "./services/export/flashcard-export.service";
import { FlashcardGeneratorService } from "./services/flashcard/flashcard-generator.service";
import { ModelClient, createProvider } from "./services/ai";
import { NotificationService } from "./services/ui/notification.service";
import { GenerationStateManager } from "./state";

async function main(): Promise<number> {
    loadDotenv();
    const notifier = new NotificationService(process.stdout, process.stderr);

    let options: CliOptions;
    try {
        options = parseCliArgs(process.argv.slice(2));
    } catch (error) {
        if (error instanceof ValidationError) {
            notifier.warning(error.toUserMessage());
            notifier.print(HELP_TEXT);
            return EXIT_CODES.usage;
        }
        throw error;
    }

    if (options.help) {
        notifier.print(HELP_TEXT);
        return EXIT_CODES.success;
    }

    let config: AppConfig;
    try {
        config = loadConfig(process.env, {
            provider: options.provider,
            model: options.model,
            outputDir: options.outDir,
        });
    } catch (error) {
        if (error instanceof ConfigurationError) {
            notifier.error(error.toUserMessage());
            return EXIT_CODES.usage;
        }
        throw error;
    }

    const client = new ModelClient(createProvider(config), config.client);

    return runCli(options, {
        generator: new FlashcardGeneratorService(client),
        exporter: new FlashcardExportService(config.outputDir),
        notifier,
        state: new GenerationStateManager(),
        input: createProcessInputSources(),
    });
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error("[Flashcard Forge] Unexpected error:", error);
        process.exitCode = EXIT_CODES.failure;
    }
);
