/**
 * Error raised when a model reply cannot be turned into flashcards
 */
import { AppError } from "./base.error";

export class DecodeError extends AppError {
    constructor(
        message: string,
        public readonly rawText: string,
        public readonly details: string[] = [],
        options?: { cause?: unknown }
    ) {
        super(message, "DECODE_ERROR", true, options);
    }

    /**
     * The JSON parse failure, when that is what went wrong
     */
    get parseError(): Error | undefined {
        return this.cause instanceof Error ? this.cause : undefined;
    }

    toUserMessage(): string {
        return `Error parsing AI response: ${this.message}`;
    }
}
