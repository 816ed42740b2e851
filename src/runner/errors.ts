/**
 * Raised when a path given to the runner does not resolve to a readable file.
 *
 * Recovered per file: the run reports it, records the failure and moves on.
 */
export class FileNotFoundError extends Error {
    readonly filePath: string;

    constructor(filePath: string, options?: { cause?: unknown }) {
        super(`File '${filePath}' was not found`, options);
        this.name = "FileNotFoundError";
        this.filePath = filePath;
    }
}

/**
 * Raised by the argument parser for unknown options or missing files.
 */
export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CliUsageError";
    }
}
