/**
 * Command-line argument parsing
 */
import { parseArgs } from "node:util";
import { GENERATION_LIMITS } from "../constants";
import { ValidationError } from "../errors";

export interface CliOptions {
    text?: string;
    file?: string;
    sample: boolean;
    count: number;
    provider?: string;
    model?: string;
    outDir?: string;
    save: boolean;
    help: boolean;
}

export const HELP_TEXT = `Usage: flashcard-forge [options]

Turn study notes into question/answer flashcards.

Input (one of; defaults to stdin):
  -t, --text <text>       Study material given inline
  -f, --file <path>       Read study material from a file
      --sample            Use the built-in sample text

Options:
  -n, --count <n>         How many flashcards to generate (${GENERATION_LIMITS.minCardCount}-${GENERATION_LIMITS.maxCardCount}, default ${GENERATION_LIMITS.defaultCardCount})
  -p, --provider <name>   gemini or openrouter (default: FLASHCARDS_PROVIDER or gemini)
  -m, --model <id>        Model id for the provider
  -o, --out-dir <dir>     Where exports are written (default: flashcards)
      --no-save           Print the cards without writing CSV/JSON files
  -h, --help              Show this help`;

/**
 * Parse a card count flag; range checks happen with the rest of the request
 */
function parseCount(value: string | undefined): number {
    if (value === undefined) {
        return GENERATION_LIMITS.defaultCardCount;
    }
    const count = Number(value.trim());
    if (!value.trim() || !Number.isInteger(count)) {
        throw new ValidationError(`"${value}" is not a whole number`, "count");
    }
    return count;
}

function readValues(argv: string[]) {
    return parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
            text: { type: "string", short: "t" },
            file: { type: "string", short: "f" },
            sample: { type: "boolean", default: false },
            count: { type: "string", short: "n" },
            provider: { type: "string", short: "p" },
            model: { type: "string", short: "m" },
            "out-dir": { type: "string", short: "o" },
            "no-save": { type: "boolean", default: false },
            help: { type: "boolean", short: "h", default: false },
        },
    }).values;
}

/**
 * @param argv - Arguments after the script name
 * @throws ValidationError for unknown options or a non-numeric count
 */
export function parseCliArgs(argv: string[]): CliOptions {
    let values: ReturnType<typeof readValues>;
    try {
        values = readValues(argv);
    } catch (error) {
        throw new ValidationError(
            error instanceof Error ? error.message : String(error),
            "arguments"
        );
    }

    return {
        text: values.text,
        file: values.file,
        sample: values.sample ?? false,
        count: parseCount(values.count),
        provider: values.provider,
        model: values.model,
        outDir: values["out-dir"],
        save: !values["no-save"],
        help: values.help ?? false,
    };
}
