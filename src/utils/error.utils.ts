/**
 * Error Utilities
 * Provides consistent error message extraction across the application
 */
import { getErrorMessage } from "../errors";

/**
 * Create a formatted error message with context
 * @param context - The action that failed (e.g., "write CSV export", "read input file")
 * @param error - The error that occurred
 */
export function formatErrorMessage(context: string, error: unknown): string {
	return `Failed to ${context}: ${getErrorMessage(error)}`;
}

/**
 * Read an HTTP status code off an SDK error, if it carries one
 * Both `status` and `statusCode` spellings are in use across SDKs
 */
export function readStatusCode(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null) {
		return undefined;
	}
	for (const key of ["status", "statusCode"] as const) {
		if (key in error) {
			const value: unknown = Reflect.get(error, key);
			if (typeof value === "number" && Number.isInteger(value)) {
				return value;
			}
		}
	}
	return undefined;
}

/**
 * Read a Node-style error code (ECONNRESET, ETIMEDOUT, ...) from an error or its cause
 */
export function readErrorCode(error: unknown): string | undefined {
	let current: unknown = error;
	for (let depth = 0; depth < 3 && typeof current === "object" && current !== null; depth++) {
		if ("code" in current) {
			const code: unknown = Reflect.get(current, "code");
			if (typeof code === "string") {
				return code;
			}
		}
		current = "cause" in current ? Reflect.get(current, "cause") : undefined;
	}
	return undefined;
}
