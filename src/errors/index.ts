/**
 * Central export point for all error classes
 */
import { AppError } from "./base.error";

// Base error
export { AppError } from "./base.error";

// Provider errors
export {
    ProviderError,
    TRANSIENT_PROVIDER_ERROR_KINDS,
    type ProviderErrorKind,
} from "./provider.error";

// Decode errors
export { DecodeError } from "./decode.error";

// Validation errors
export {
    ValidationError,
    ConfigurationError,
    FileError,
} from "./validation.error";

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}

/**
 * Extract user-friendly message from any error
 */
export function getErrorMessage(error: unknown): string {
    if (isAppError(error)) {
        return error.toUserMessage();
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
