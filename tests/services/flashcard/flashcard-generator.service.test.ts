import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { FlashcardGeneratorService } from "../../../src/services/flashcard/flashcard-generator.service";
import { ModelClient } from "../../../src/services/ai/model-client.service";
import { toCsv, toJson } from "../../../src/services/export/flashcard-export.service";
import {
    ConfigurationError,
    DecodeError,
    ProviderError,
    ValidationError,
} from "../../../src/errors";
import {
    FakeProvider,
    PHOTOSYNTHESIS_CARDS,
    PHOTOSYNTHESIS_TEXT,
    SHORT_TEXT,
    createHttpError,
} from "../mocks/provider.mocks";

const GENERATED_AT = new Date(2026, 9, 18, 9, 30, 0);

function createGenerator(provider: FakeProvider): FlashcardGeneratorService {
    const client = new ModelClient(provider, { timeoutMs: 0, retryAttempts: 0, retryDelayMs: 0 });
    return new FlashcardGeneratorService(client, () => GENERATED_AT);
}

describe("FlashcardGeneratorService", () => {
    beforeEach(() => {
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should generate, decode and export a photosynthesis batch end to end", async () => {
        const provider = new FakeProvider(JSON.stringify(PHOTOSYNTHESIS_CARDS));
        const generator = createGenerator(provider);

        const result = await generator.generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(result).toEqual({
            success: true,
            flashcards: PHOTOSYNTHESIS_CARDS,
            requestedCount: 3,
            generatedAt: GENERATED_AT,
        });
        if (!result.success) return;

        const csvLines = toCsv(result.flashcards).trimEnd().split("\n");
        expect(csvLines).toHaveLength(4);
        expect(csvLines[0]).toBe("question,answer");
        expect(csvLines[2]).toBe('Which inputs does photosynthesis use?,"Light, water and carbon dioxide."');

        const exported: unknown = JSON.parse(toJson(result.flashcards));
        expect(exported).toEqual(PHOTOSYNTHESIS_CARDS);
        expect(toJson(result.flashcards).split("\n")[1]).toBe("  {");
    });

    it("should send one prompt carrying the text and the count", async () => {
        const provider = new FakeProvider(JSON.stringify(PHOTOSYNTHESIS_CARDS));

        await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(provider.callCount).toBe(1);
        expect(provider.prompts[0]).toContain(PHOTOSYNTHESIS_TEXT);
        expect(provider.prompts[0]).toContain("Generate exactly 3 flashcards.");
    });

    it("should reject short text without calling the provider", async () => {
        const provider = new FakeProvider(JSON.stringify(PHOTOSYNTHESIS_CARDS));

        const result = await createGenerator(provider).generate({ sourceText: SHORT_TEXT, cardCount: 3 });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error).toMatchObject({ field: "sourceText" });
        expect(provider.callCount).toBe(0);
    });

    it.each([0, 201, 2.5])("should reject card count %s without calling the provider", async (cardCount) => {
        const provider = new FakeProvider("[]");

        const result = await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(provider.callCount).toBe(0);
    });

    it("should accept the boundary card counts", async () => {
        const provider = new FakeProvider(JSON.stringify(PHOTOSYNTHESIS_CARDS));
        const generator = createGenerator(provider);

        const low = await generator.generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 1 });
        const high = await generator.generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 200 });

        expect(low.success).toBe(true);
        expect(high.success).toBe(true);
    });

    it("should return a ProviderError failure when the call fails", async () => {
        const provider = new FakeProvider(createHttpError(429, "Too many requests"));

        const result = await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(ProviderError);
        expect(result.error).toMatchObject({ kind: "rate_limit", statusCode: 429 });
        expect(provider.callCount).toBe(1);
    });

    it("should return a ConfigurationError failure when the key is missing", async () => {
        const provider = new FakeProvider(new ConfigurationError("no key", "GOOGLE_API_KEY"));

        const result = await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(ConfigurationError);
    });

    it("should return a DecodeError failure for malformed JSON", async () => {
        const provider = new FakeProvider('[{"question":"Q","answer":"A"},');

        const result = await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(DecodeError);
    });

    it("should return a DecodeError failure for an empty reply", async () => {
        const provider = new FakeProvider("   ");

        const result = await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(DecodeError);
    });

    it("should accept a batch whose size differs from the request and warn", async () => {
        const provider = new FakeProvider(JSON.stringify(PHOTOSYNTHESIS_CARDS.slice(0, 2)));

        const result = await createGenerator(provider).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.flashcards).toHaveLength(2);
        expect(result.requestedCount).toBe(3);
        expect(console.warn).toHaveBeenCalledWith(
            "[FlashcardGenerator] Requested 3 flashcards, Fake returned 2"
        );
    });

    it("should rethrow unexpected errors", async () => {
        const client = new ModelClient(new FakeProvider("[]"), { timeoutMs: 0 });
        vi.spyOn(client, "complete").mockRejectedValue(new RangeError("bug"));

        await expect(
            new FlashcardGeneratorService(client).generate({ sourceText: PHOTOSYNTHESIS_TEXT, cardCount: 3 })
        ).rejects.toThrow(RangeError);
    });
});
