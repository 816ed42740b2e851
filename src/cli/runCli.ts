import { CliUsageError } from "../runner/errors";
import { FormatRunOptions } from "../runner/options.schema";
import { formatFiles, OutputStreams, processStreams } from "../runner/formatFiles";
import { parseCliArgs } from "./parseCliArgs";

/**
 * Exit status for a command line that could not be parsed.
 */
export const USAGE_ERROR_EXIT_CODE = 2;

/**
 * Run the tool for one command line and return the process exit status.
 */
export function runCli(
    argv: readonly string[],
    streams: OutputStreams = processStreams
): number {
    let options: FormatRunOptions | undefined;
    try {
        options = parseCliArgs(argv);
    } catch (err) {
        if (!(err instanceof CliUsageError)) throw err;

        streams.stderr(`Error: ${err.message}\nRun with --help for usage.\n`);
        return USAGE_ERROR_EXIT_CODE;
    }

    if (options === undefined) return 0;

    return formatFiles(options, streams).exitCode;
}
