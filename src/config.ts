/**
 * Application configuration
 * Read once from the environment at startup, then frozen and passed explicitly
 */
import { PROVIDERS } from "./constants";
import { ConfigurationError } from "./errors";
import type { ModelClientOptions, ProviderName } from "./types";
import { EnvironmentSchema, ProviderNameSchema } from "./validation";

export interface AppConfig {
    readonly provider: ProviderName;
    readonly apiKey: string;
    readonly model: string;
    readonly temperature: number;
    readonly outputDir: string;
    readonly client: Readonly<ModelClientOptions>;
}

/** Values a caller (the CLI flags) may set on top of the environment */
export interface ConfigOverrides {
    provider?: string;
    model?: string;
    outputDir?: string;
}

/**
 * Build the configuration from environment variables
 *
 * A missing API key is not an error here; every generation call fails instead.
 *
 * @param env - Usually process.env after dotenv has loaded .env
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(
    env: Record<string, string | undefined> = process.env,
    overrides: ConfigOverrides = {}
): AppConfig {
    const result = EnvironmentSchema.safeParse(env);
    if (!result.success) {
        const issue = result.error.issues[0];
        const key = issue?.path.map(String).join(".");
        throw new ConfigurationError(issue?.message ?? "Invalid environment", key || undefined);
    }
    const vars = result.data;

    let provider: ProviderName = vars.FLASHCARDS_PROVIDER;
    if (overrides.provider !== undefined) {
        const parsed = ProviderNameSchema.safeParse(overrides.provider);
        if (!parsed.success) {
            throw new ConfigurationError(
                `Unknown provider "${overrides.provider}". Expected one of: ${ProviderNameSchema.options.join(", ")}`,
                "provider"
            );
        }
        provider = parsed.data;
    }

    const apiKey = provider === "gemini" ? vars.GOOGLE_API_KEY : vars.OPENROUTER_API_KEY;
    // An env model id belongs to the env provider; switching provider by flag resets it
    const envModel = overrides.provider === undefined ? vars.FLASHCARDS_MODEL : undefined;
    const model = overrides.model?.trim() || envModel || PROVIDERS[provider].defaultModel;

    return Object.freeze({
        provider,
        apiKey,
        model,
        temperature: vars.FLASHCARDS_TEMPERATURE,
        outputDir: overrides.outputDir?.trim() || vars.FLASHCARDS_OUTPUT_DIR,
        client: Object.freeze({
            timeoutMs: vars.FLASHCARDS_TIMEOUT_MS,
            retryAttempts: vars.FLASHCARDS_RETRY_ATTEMPTS,
            retryDelayMs: vars.FLASHCARDS_RETRY_DELAY_MS,
        }),
    });
}
