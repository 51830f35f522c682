/**
 * Flashcard List Renderer
 * Plain-text listing of a generated batch for the terminal
 */
import { DISPLAY_CONFIG } from "../constants";
import type { Flashcard } from "../types";

const CONTINUATION_INDENT = "    ";

/**
 * Shorten a question for a list heading
 */
export function previewQuestion(
	question: string,
	maxLength: number = DISPLAY_CONFIG.questionPreviewLength
): string {
	return question.length > maxLength ? `${question.slice(0, maxLength)}...` : question;
}

function indentContinuation(text: string): string {
	return text.replace(/\n/g, `\n${CONTINUATION_INDENT}`);
}

/**
 * One block per card, numbered from 1 in generation order
 */
export function renderFlashcard(card: Flashcard, index: number): string {
	return [
		`Flashcard ${index + 1}: ${previewQuestion(card.question)}`,
		`  Question: ${indentContinuation(card.question)}`,
		`  Answer:   ${indentContinuation(card.answer)}`,
	].join("\n");
}

export function renderFlashcardList(flashcards: readonly Flashcard[]): string {
	return flashcards.map(renderFlashcard).join("\n\n");
}
