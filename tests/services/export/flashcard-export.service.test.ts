import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
	FlashcardExportService,
	buildExportBaseName,
	escapeCsvField,
	toCsv,
	toJson,
} from "../../../src/services/export/flashcard-export.service";
import { FileError } from "../../../src/errors";
import { PHOTOSYNTHESIS_CARDS } from "../mocks/provider.mocks";

const GENERATED_AT = new Date(2026, 0, 5, 7, 8, 9);

describe("escapeCsvField", () => {
	it("should leave plain text alone", () => {
		expect(escapeCsvField("What is ATP?")).toBe("What is ATP?");
	});

	it("should quote fields with commas", () => {
		expect(escapeCsvField("a, b")).toBe('"a, b"');
	});

	it("should double embedded quotes", () => {
		expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
	});

	it("should quote fields with line breaks", () => {
		expect(escapeCsvField("line 1\nline 2")).toBe('"line 1\nline 2"');
		expect(escapeCsvField("a\rb")).toBe('"a\rb"');
	});
});

describe("toCsv", () => {
	it("should write a header and one row per card", () => {
		expect(toCsv(PHOTOSYNTHESIS_CARDS)).toBe(
			"question,answer\n" +
				"What does photosynthesis produce?,Glucose and oxygen.\n" +
				'Which inputs does photosynthesis use?,"Light, water and carbon dioxide."\n' +
				"Why do plants need photosynthesis?,To make glucose for energy.\n"
		);
	});

	it("should write only the header for an empty batch", () => {
		expect(toCsv([])).toBe("question,answer\n");
	});
});

describe("toJson", () => {
	it("should pretty-print with two spaces", () => {
		expect(toJson([{ question: "Q", answer: "A" }])).toBe(
			'[\n  {\n    "question": "Q",\n    "answer": "A"\n  }\n]'
		);
	});

	it("should keep only question and answer", () => {
		const card = Object.assign({ question: "Q", answer: "A" }, { extra: true });

		expect(JSON.parse(toJson([card]))).toEqual([{ question: "Q", answer: "A" }]);
	});

	it("should keep non-ASCII text as is", () => {
		expect(toJson([{ question: "Qu'est-ce que la chlorophylle ?", answer: "Un pigment vert 🌿" }])).toContain(
			'"answer": "Un pigment vert 🌿"'
		);
	});
});

describe("buildExportBaseName", () => {
	it("should use the local generation time", () => {
		expect(buildExportBaseName(GENERATED_AT)).toBe("flashcards_20260105_070809");
	});
});

describe("FlashcardExportService", () => {
	let workDir: string;

	beforeEach(async () => {
		workDir = await mkdtemp(path.join(os.tmpdir(), "flashcard-export-"));
	});

	afterEach(async () => {
		await rm(workDir, { recursive: true, force: true });
	});

	it("should create the output directory and write both files", async () => {
		const outputDir = path.join(workDir, "nested", "flashcards");
		const exporter = new FlashcardExportService(outputDir);

		const paths = await exporter.save(PHOTOSYNTHESIS_CARDS, GENERATED_AT);

		expect(paths).toEqual({
			csvPath: path.join(outputDir, "flashcards_20260105_070809.csv"),
			jsonPath: path.join(outputDir, "flashcards_20260105_070809.json"),
		});
		expect(await readFile(paths.csvPath, "utf8")).toBe(toCsv(PHOTOSYNTHESIS_CARDS));
		expect(JSON.parse(await readFile(paths.jsonPath, "utf8"))).toEqual(PHOTOSYNTHESIS_CARDS);
	});

	it("should overwrite an export with the same timestamp", async () => {
		const exporter = new FlashcardExportService(workDir);

		await exporter.save(PHOTOSYNTHESIS_CARDS, GENERATED_AT);
		const paths = await exporter.save([{ question: "Q", answer: "A" }], GENERATED_AT);

		expect(await readFile(paths.csvPath, "utf8")).toBe("question,answer\nQ,A\n");
	});

	it("should report the directory it writes to", () => {
		expect(new FlashcardExportService(workDir).directory).toBe(workDir);
		expect(new FlashcardExportService().directory).toBe("flashcards");
	});

	it("should fail with FileError when the directory cannot be created", async () => {
		const blocker = path.join(workDir, "not-a-dir");
		await writeFile(blocker, "occupied");
		const exporter = new FlashcardExportService(path.join(blocker, "flashcards"));

		await expect(exporter.save(PHOTOSYNTHESIS_CARDS, GENERATED_AT)).rejects.toMatchObject({
			name: "FileError",
			operation: "create",
			filePath: path.join(blocker, "flashcards"),
		});
		await expect(exporter.save(PHOTOSYNTHESIS_CARDS, GENERATED_AT)).rejects.toBeInstanceOf(FileError);
	});
});
