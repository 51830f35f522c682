/**
 * Model Client
 * Sends a prompt to the configured text-generation provider and returns the raw reply
 */
import { setTimeout as sleep } from "node:timers/promises";
import { API_CONFIG } from "../../constants";
import {
    ProviderError,
    ValidationError,
    getErrorMessage,
    isAppError,
    type ProviderErrorKind,
} from "../../errors";
import type { GenerationProvider, ModelClientOptions } from "../../types";
import { readErrorCode, readStatusCode } from "../../utils";

const DEFAULT_OPTIONS: ModelClientOptions = {
    timeoutMs: API_CONFIG.timeoutMs,
    retryAttempts: API_CONFIG.retryAttempts,
    retryDelayMs: API_CONFIG.retryDelayMs,
};

const NETWORK_ERROR_CODES = new Set([
    "ECONNREFUSED",
    "ECONNRESET",
    "ENOTFOUND",
    "EAI_AGAIN",
    "EPIPE",
    "UND_ERR_SOCKET",
    "UND_ERR_CONNECT_TIMEOUT",
]);

/**
 * Map an HTTP status to a failure kind
 */
function kindFromStatus(status: number): ProviderErrorKind {
    if (status === 401 || status === 403) return "auth";
    if (status === 408) return "timeout";
    if (status === 429) return "rate_limit";
    if (status >= 500) return "server";
    return "unknown";
}

/**
 * Service wrapping a single GenerationProvider
 */
export class ModelClient {
    private readonly options: ModelClientOptions;

    constructor(
        private readonly provider: GenerationProvider,
        options: Partial<ModelClientOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    get providerName(): string {
        return this.provider.name;
    }

    /**
     * Send a prompt and return the provider's raw text, unvalidated
     *
     * @throws ValidationError if the prompt is empty
     * @throws ConfigurationError unchanged, without retrying
     * @throws ProviderError for every other failure
     */
    async complete(prompt: string): Promise<string> {
        if (!prompt.trim()) {
            throw new ValidationError("Prompt cannot be empty", "prompt");
        }

        for (let attempt = 0; ; attempt++) {
            try {
                return await this.callProvider(prompt);
            } catch (error) {
                if (isAppError(error) && !error.isRecoverable) {
                    throw error;
                }

                const providerError = this.toProviderError(error);
                if (!providerError.isTransient || attempt >= this.options.retryAttempts) {
                    throw providerError;
                }

                const delay = this.options.retryDelayMs * 2 ** attempt;
                console.warn(
                    `[ModelClient] ${this.provider.name} ${providerError.kind} error, retry ${attempt + 1}/${this.options.retryAttempts} in ${delay}ms:`,
                    providerError.message
                );
                await sleep(delay);
            }
        }
    }

    /**
     * One provider call, bounded by the configured timeout
     */
    private async callProvider(prompt: string): Promise<string> {
        const { timeoutMs } = this.options;
        if (timeoutMs <= 0) {
            return this.provider.generate(prompt);
        }

        // Aborted on timeout so a retry never overlaps the request it replaces
        const controller = new AbortController();
        const call = this.provider.generate(prompt, controller.signal);

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                // The call keeps running; report how it ends
                call.catch((lateError: unknown) => {
                    console.warn(
                        `[ModelClient] ${this.provider.name} call failed after timing out:`,
                        getErrorMessage(lateError)
                    );
                });
                reject(
                    new ProviderError(
                        `Request timed out after ${timeoutMs}ms`,
                        "timeout",
                        undefined,
                        this.provider.name
                    )
                );
                controller.abort();
            }, timeoutMs);
        });

        try {
            return await Promise.race([call, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Classify whatever the provider threw
     */
    private toProviderError(error: unknown): ProviderError {
        if (error instanceof ProviderError) {
            return error;
        }

        const message = error instanceof Error ? error.message : String(error);
        const status = readStatusCode(error);
        if (status !== undefined) {
            return new ProviderError(message, kindFromStatus(status), status, this.provider.name, { cause: error });
        }

        const code = readErrorCode(error);
        if (code === "ETIMEDOUT" || (error instanceof Error && /timed? ?out/i.test(error.name))) {
            return new ProviderError(message, "timeout", undefined, this.provider.name, { cause: error });
        }
        if (
            (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
            (error instanceof Error && (error.name === "APIConnectionError" || /fetch failed|network|socket hang up/i.test(message)))
        ) {
            return new ProviderError(message, "network", undefined, this.provider.name, { cause: error });
        }

        return new ProviderError(message, "unknown", undefined, this.provider.name, { cause: error });
    }
}
