// File: `src/runner/formatFiles.ts`

import fs from "fs";
import { normalizeSource } from "../normalizer/normalizeLineComments";
import { FileNotFoundError } from "./errors";
import { Logger } from "./Logger";
import { FormatRunOptions } from "./options.schema";

/**
 * Destinations for the text a run produces.
 *
 * stdout receives formatted source (when not rewriting in place),
 * stderr receives the per-file error lines and the closing note.
 */
export interface OutputStreams {
    stdout(text: string): void;
    stderr(text: string): void;
}

export const processStreams: OutputStreams = {
    stdout(text) {
        process.stdout.write(text);
    },
    stderr(text) {
        process.stderr.write(text);
    }
};

/**
 * Outcome of one run, per path as given.
 */
export type FormatRunResult = {
    /**
     * 0 when every file was formatted or skipped, 1 when any was missing.
     */
    exitCode: 0 | 1;

    formatted: string[];

    /**
     * Repeats of a path already formatted in this run.
     */
    skipped: string[];

    failed: string[];
};

/**
 * Format each file in order.
 *
 * A missing file is reported and recorded but does not stop the run.
 * Paths are compared as literal strings when looking for repeats.
 * Any I/O failure other than a missing file propagates.
 */
export function formatFiles(
    options: FormatRunOptions,
    streams: OutputStreams = processStreams
): FormatRunResult {
    Logger.setLevel(options.verbose ? "info" : "silent");

    const alreadyFormatted = new Set<string>();
    const result: FormatRunResult = {
        exitCode: 0,
        formatted: [],
        skipped: [],
        failed: []
    };

    for (const filePath of options.files) {
        if (alreadyFormatted.has(filePath)) {
            Logger.info(`Skipping '${filePath}': already formatted in this run`);
            result.skipped.push(filePath);
            continue;
        }

        Logger.info(`Formatting '${filePath}'`);

        let source: string;
        try {
            source = readSource(filePath);
        } catch (err) {
            if (!(err instanceof FileNotFoundError)) throw err;

            streams.stderr(`Error: ${err.message}\n`);
            result.failed.push(filePath);
            continue;
        }

        // One extra newline after the last line, as printing the text adds.
        const output = normalizeSource(source) + "\n";
        Logger.debug(`'${filePath}': ${source.length} chars in, ${output.length} chars out`);

        if (options.inplace) {
            fs.writeFileSync(filePath, output, "utf8");
            Logger.info(`Rewrote '${filePath}' in place`);
        } else {
            streams.stdout(output);
        }

        alreadyFormatted.add(filePath);
        result.formatted.push(filePath);
    }

    if (result.failed.length > 0) {
        streams.stderr("Note: errors occurred while formatting\n");
        result.exitCode = 1;
    }

    return result;
}

// ======================================================
// File helpers
// ======================================================

function readSource(filePath: string): string {
    try {
        return fs.readFileSync(filePath, "utf8");
    } catch (err) {
        if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "EISDIR")) {
            throw new FileNotFoundError(filePath, { cause: err });
        }
        throw err;
    }
}

// Matched by shape: fs errors can come from another realm.
function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return typeof err === "object" && err !== null && "code" in err;
}
