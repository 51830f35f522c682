/**
 * Zod schema for the environment-derived configuration
 */
import { z } from "zod";
import { API_CONFIG, EXPORT_CONFIG } from "../../constants";

// ===== Provider Schema =====

export const ProviderNameSchema = z.enum(["gemini", "openrouter"]);

// ===== Environment Schema =====

/**
 * Drop blank values: a `KEY=` line in .env means the variable is unset
 */
function omitBlankValues(env: unknown): unknown {
    if (typeof env !== "object" || env === null) {
        return env;
    }
    return Object.fromEntries(
        Object.entries(env).filter(
            ([, value]) => !(typeof value === "string" && value.trim() === "")
        )
    );
}

/**
 * Raw environment variables; everything optional so defaults apply
 */
const EnvironmentVariablesSchema = z.object({
    FLASHCARDS_PROVIDER: ProviderNameSchema.default("gemini"),
    GOOGLE_API_KEY: z.string().default(""),
    OPENROUTER_API_KEY: z.string().default(""),
    FLASHCARDS_MODEL: z.string().trim().optional(),
    FLASHCARDS_OUTPUT_DIR: z
        .string()
        .trim()
        .default(EXPORT_CONFIG.outputDir),
    FLASHCARDS_TEMPERATURE: z.coerce
        .number()
        .min(0)
        .max(2)
        .default(API_CONFIG.defaultTemperature),
    FLASHCARDS_TIMEOUT_MS: z.coerce
        .number()
        .int()
        .nonnegative()
        .default(API_CONFIG.timeoutMs),
    FLASHCARDS_RETRY_ATTEMPTS: z.coerce
        .number()
        .int()
        .min(0)
        .max(API_CONFIG.maxRetryAttempts)
        .default(API_CONFIG.retryAttempts),
    FLASHCARDS_RETRY_DELAY_MS: z.coerce
        .number()
        .int()
        .nonnegative()
        .default(API_CONFIG.retryDelayMs),
});

export const EnvironmentSchema = z.preprocess(omitBlankValues, EnvironmentVariablesSchema);
