/**
 * Errors raised while talking to a text-generation provider
 */
import { AppError } from "./base.error";

/**
 * Why a provider call could not complete
 */
export type ProviderErrorKind =
    | "network"
    | "auth"
    | "rate_limit"
    | "server"
    | "timeout"
    | "empty_response"
    | "unknown";

/** Kinds worth another attempt when retries are enabled */
export const TRANSIENT_PROVIDER_ERROR_KINDS: readonly ProviderErrorKind[] = [
    "network",
    "rate_limit",
    "server",
    "timeout",
];

/**
 * Error thrown when a generation call fails
 */
export class ProviderError extends AppError {
    constructor(
        message: string,
        public readonly kind: ProviderErrorKind = "unknown",
        public readonly statusCode?: number,
        public readonly provider: string = "Unknown",
        options?: { cause?: unknown }
    ) {
        super(message, "PROVIDER_ERROR", true, options);
    }

    get isTransient(): boolean {
        return TRANSIENT_PROVIDER_ERROR_KINDS.includes(this.kind);
    }

    toUserMessage(): string {
        switch (this.kind) {
            case "auth":
                return `Authentication failed with ${this.provider}. Please check your API key.`;
            case "rate_limit":
                return `Rate limit exceeded for ${this.provider}. Please try again later.`;
            case "server":
                return `${this.provider} service is temporarily unavailable. Please try again later.`;
            case "network":
                return `Unable to reach ${this.provider}. Please check your internet connection.`;
            case "timeout":
                return `${this.provider} took too long to respond. Please try again.`;
            case "empty_response":
                return `${this.provider} returned an empty response. Please try again.`;
            default:
                return `Error generating flashcards: ${this.message}`;
        }
    }
}
