/**
 * Types for text-generation providers
 */

// Providers the client can be configured with
export type ProviderName = "gemini" | "openrouter";

/**
 * A hosted text-generation backend
 *
 * Implementations return the model's raw reply. They throw whatever their SDK
 * throws; the ModelClient classifies it. An aborted `signal` must cancel the
 * underlying request.
 */
export interface GenerationProvider {
    readonly name: string;
    generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

// Per-call behavior of the ModelClient
export interface ModelClientOptions {
    /** 0 disables the timeout */
    timeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
}

// Construction options shared by the concrete providers
export interface ProviderSettings {
    apiKey: string;
    model: string;
    temperature: number;
}
