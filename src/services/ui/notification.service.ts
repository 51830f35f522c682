/**
 * NotificationService
 * User-facing messages for the terminal front end
 *
 * Success and info go to `out`, warnings and errors to `err`, so piping stdout
 * stays clean of failure output.
 */
import { getErrorMessage, isAppError } from "../../errors";
import type { ExportPaths } from "../../types";

/** Anything with a write method, such as process.stdout */
export interface OutputStream {
	write(chunk: string): unknown;
}

export const NOTIFICATION_ICONS = {
	success: "✅",
	error: "❌",
	warning: "⚠️",
	info: "💡",
	progress: "🤖",
} as const;

export class NotificationService {
	constructor(
		private readonly out: OutputStream,
		private readonly err: OutputStream
	) {}

	success(message: string): void {
		this.out.write(`${NOTIFICATION_ICONS.success} ${message}\n`);
	}

	/**
	 * @param error - Optional cause, logged to the console for debugging
	 */
	error(message: string, error?: unknown): void {
		if (error) {
			console.error(`[Flashcard Forge] ${message}:`, error);
		}
		this.err.write(`${NOTIFICATION_ICONS.error} ${message}\n`);
	}

	warning(message: string): void {
		this.err.write(`${NOTIFICATION_ICONS.warning} ${message}\n`);
	}

	info(message: string): void {
		this.out.write(`${NOTIFICATION_ICONS.info} ${message}\n`);
	}

	/** Plain text, no icon */
	print(text: string): void {
		this.out.write(`${text}\n`);
	}

	// ===== Generation Notifications =====

	progress(cardCount: number): void {
		const noun = cardCount === 1 ? "flashcard" : "flashcards";
		this.err.write(`${NOTIFICATION_ICONS.progress} AI is creating your ${cardCount} ${noun}...\n`);
	}

	flashcardsGenerated(count: number): void {
		const noun = count === 1 ? "flashcard" : "flashcards";
		this.success(`Generated ${count} ${noun}!`);
	}

	generationFailed(error: unknown): void {
		this.error(getErrorMessage(error));
		if (isAppError(error) && !error.isRecoverable) {
			this.info("Update your .env file or environment, then run again.");
		}
	}

	filesSaved(paths: ExportPaths, directory: string): void {
		this.print(`CSV:  ${paths.csvPath}`);
		this.print(`JSON: ${paths.jsonPath}`);
		this.success(`Files saved in '${directory}/' folder`);
	}
}
