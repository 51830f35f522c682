/**
 * Flashcard Export
 * Serializes a batch to CSV and JSON and writes both under the output directory
 */
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { EXPORT_CONFIG } from "../../constants";
import { FileError } from "../../errors";
import type { ExportPaths, Flashcard } from "../../types";
import { formatErrorMessage, formatTimestamp } from "../../utils";

const CSV_SPECIAL_CHARS = /[",\r\n]/;

/**
 * Quote a CSV field when it holds a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
	if (!CSV_SPECIAL_CHARS.test(value)) {
		return value;
	}
	return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Header row plus one row per card, newline-terminated
 */
export function toCsv(flashcards: readonly Flashcard[]): string {
	const rows = [
		EXPORT_CONFIG.csvColumns.join(","),
		...flashcards.map((card) =>
			[card.question, card.answer].map(escapeCsvField).join(",")
		),
	];
	return `${rows.join("\n")}\n`;
}

/**
 * Pretty-printed array of {question, answer} objects
 */
export function toJson(flashcards: readonly Flashcard[]): string {
	const plain = flashcards.map(({ question, answer }) => ({ question, answer }));
	return JSON.stringify(plain, null, EXPORT_CONFIG.jsonIndent);
}

/**
 * File name without extension: flashcards_YYYYMMDD_HHMMSS
 */
export function buildExportBaseName(generatedAt: Date): string {
	return `${EXPORT_CONFIG.filePrefix}${formatTimestamp(generatedAt)}`;
}

/**
 * Writes exports into one directory, creating it on first use
 * Same timestamp means same file names, so a re-export overwrites
 */
export class FlashcardExportService {
	constructor(private readonly outputDir: string = EXPORT_CONFIG.outputDir) {}

	get directory(): string {
		return this.outputDir;
	}

	/**
	 * Write both exports for a batch
	 *
	 * @throws FileError if the directory or either file cannot be written
	 */
	async save(flashcards: readonly Flashcard[], generatedAt: Date): Promise<ExportPaths> {
		const baseName = buildExportBaseName(generatedAt);
		const csvPath = path.join(this.outputDir, `${baseName}.csv`);
		const jsonPath = path.join(this.outputDir, `${baseName}.json`);

		await this.ensureOutputDir();
		await Promise.all([
			this.write(csvPath, toCsv(flashcards)),
			this.write(jsonPath, toJson(flashcards)),
		]);

		return { csvPath, jsonPath };
	}

	private async ensureOutputDir(): Promise<void> {
		try {
			await mkdir(this.outputDir, { recursive: true });
		} catch (error) {
			throw new FileError(
				formatErrorMessage("create output directory", error),
				this.outputDir,
				"create",
				{ cause: error }
			);
		}
	}

	private async write(filePath: string, content: string): Promise<void> {
		try {
			await writeFile(filePath, content, "utf8");
		} catch (error) {
			throw new FileError(
				formatErrorMessage(`write ${path.basename(filePath)}`, error),
				filePath,
				"write",
				{ cause: error }
			);
		}
	}
}
