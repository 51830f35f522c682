/**
 * Prompt template for flashcard generation
 *
 * The literal card count and the JSON-only rules keep the reply parseable;
 * the mix of question styles is a quality nudge.
 */

const OUTPUT_EXAMPLE = [
    "[",
    '  {"question": "What is ...?", "answer": "..."},',
    '  {"question": "Explain ...", "answer": "..."}',
    "]",
].join("\n");

/**
 * Build the generation prompt for one request
 *
 * @param sourceText - Study material, embedded verbatim
 * @param cardCount - Exact number of flashcards to ask for
 */
export function buildFlashcardPrompt(sourceText: string, cardCount: number): string {
    return [
        `You are an expert educator. Analyze the following text and create ${cardCount} flashcards.`,
        "",
        "TEXT:",
        sourceText,
        "",
        "INSTRUCTIONS:",
        "- Write clear, concise questions that test understanding",
        "- Give accurate, complete answers grounded in the text",
        "- Cover the key concepts of the text",
        "- Vary the question styles: definitions, concepts and applications",
        "",
        "OUTPUT FORMAT:",
        'Return ONLY a JSON array of objects with exactly two string keys, "question" and "answer".',
        "No markdown, no code fences, no text before or after the array.",
        OUTPUT_EXAMPLE,
        "",
        `Generate exactly ${cardCount} flashcards.`,
    ].join("\n");
}
