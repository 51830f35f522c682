/**
 * Resolves where the study material comes from
 */
import { readFile } from "node:fs/promises";
import { SAMPLE_TEXT } from "../constants";
import { FileError, ValidationError } from "../errors";
import { formatErrorMessage } from "../utils";
import type { CliOptions } from "./args";

export interface InputSources {
    readFile(filePath: string): Promise<string>;
    readStdin(): Promise<string>;
    /** Interactive terminals are never read as input */
    stdinIsTTY: boolean;
}

async function readStream(stream: AsyncIterable<unknown>): Promise<string> {
    const chunks: string[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk));
    }
    return chunks.join("");
}

/**
 * Input sources backed by the real process
 */
export function createProcessInputSources(): InputSources {
    return {
        readFile: (filePath) => readFile(filePath, "utf8"),
        readStdin: () => readStream(process.stdin),
        stdinIsTTY: Boolean(process.stdin.isTTY),
    };
}

/**
 * Pick the study material from --sample, --text, --file or stdin
 *
 * @throws ValidationError when several sources or none are given
 * @throws FileError when the input file cannot be read
 */
export async function resolveSourceText(
    options: Pick<CliOptions, "text" | "file" | "sample">,
    sources: InputSources
): Promise<string> {
    const chosen = [options.sample, options.text !== undefined, options.file !== undefined]
        .filter(Boolean).length;
    if (chosen > 1) {
        throw new ValidationError("Use only one of --text, --file and --sample", "input");
    }

    if (options.sample) {
        return SAMPLE_TEXT;
    }
    if (options.text !== undefined) {
        return options.text;
    }
    if (options.file !== undefined) {
        try {
            return await sources.readFile(options.file);
        } catch (error) {
            throw new FileError(
                formatErrorMessage("read input file", error),
                options.file,
                "read",
                { cause: error }
            );
        }
    }
    if (sources.stdinIsTTY) {
        throw new ValidationError(
            "No study material given. Pass --text, --file or --sample, or pipe text on stdin",
            "input"
        );
    }
    return sources.readStdin();
}
