/**
 * Base application error class
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly isRecoverable: boolean = true,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = this.constructor.name;

        // V8 only
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Message safe to show in the terminal
     */
    toUserMessage(): string {
        return this.message;
    }
}
