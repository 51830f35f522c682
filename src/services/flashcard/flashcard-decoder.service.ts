/**
 * Flashcard Decoder
 * Turns a model's free-form reply into a typed batch of flashcards
 */
import { DecodeError } from "../../errors";
import type { Flashcard } from "../../types";
import { stripCodeFence } from "../../utils";
import { validateFlashcardBatch } from "../../validation";

/**
 * Name the JSON type of a parsed value for error messages
 */
function describeJsonType(value: unknown): string {
    if (value === null) return "null";
    return typeof value;
}

/**
 * Decode a raw model reply
 *
 * Steps: strip an outer code fence, parse JSON, require a non-empty array,
 * validate every element. Any failure rejects the whole batch.
 *
 * @param rawText - Reply exactly as the provider returned it
 * @throws DecodeError carrying the raw text, and the parse error as `cause` when JSON.parse failed
 */
export function decodeFlashcards(rawText: string): Flashcard[] {
    const { content } = stripCodeFence(rawText);

    if (!content) {
        throw new DecodeError("Response is empty", rawText);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new DecodeError(reason, rawText, [], { cause: error });
    }

    if (!Array.isArray(parsed)) {
        throw new DecodeError(
            `Expected a JSON array, got ${describeJsonType(parsed)}`,
            rawText
        );
    }

    return validateFlashcardBatch(parsed, rawText);
}
