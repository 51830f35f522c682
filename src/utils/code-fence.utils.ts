/**
 * Code Fence Utilities
 * Normalizes model replies that wrap their payload in a markdown code block
 */

/** Shortest run of backticks that opens or closes a fence */
const FENCE_MARKER = "```";

/**
 * Opening fence at the very start of the text, with an optional language tag
 * on the same line (```json, ``` ts, ...)
 */
const OPENING_FENCE_PATTERN = /^`{3,}[ \t]*([A-Za-z][\w+.-]*)?/;

export interface FenceStripResult {
	/** Text inside the fence, or the whole trimmed input when unfenced */
	content: string;
	fenced: boolean;
	/** Language tag from the opening fence line, if any */
	language: string | null;
	/** Whether a closing fence was found */
	closed: boolean;
}

/**
 * Strip an outer markdown code fence from a model reply
 *
 * Rules:
 * - Input is trimmed first
 * - Only a fence at the start of the text counts
 * - A language tag directly after the opening backticks is dropped
 * - Content ends at the next fence marker; a missing closing fence is tolerated
 * - Anything after the closing fence is discarded
 */
export function stripCodeFence(text: string): FenceStripResult {
	const trimmed = text.trim();
	const opening = OPENING_FENCE_PATTERN.exec(trimmed);

	if (!opening) {
		return { content: trimmed, fenced: false, language: null, closed: false };
	}

	const body = trimmed.slice(opening[0].length);
	const closingIndex = body.indexOf(FENCE_MARKER);
	const closed = closingIndex !== -1;

	return {
		content: (closed ? body.slice(0, closingIndex) : body).trim(),
		fenced: true,
		language: opening[1] ?? null,
		closed,
	};
}
