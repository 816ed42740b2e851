/**
 * Package entrypoint.
 *
 * Library users get the pure rewriting functions and the file runner;
 * the command-line tool lives in `bin.ts` and goes through `runCli`.
 */

export { detectLineComment } from "./normalizer/detectLineComment";
export type { LineCommentDetection } from "./normalizer/detectLineComment";
export { normalizeLineComments, normalizeSource } from "./normalizer/normalizeLineComments";
export { splitLines } from "./normalizer/splitLines";
export { BLOCK_COMMENT, LINE_COMMENT_MARKER } from "./normalizer/markers";

export { formatFiles, processStreams } from "./runner/formatFiles";
export type { FormatRunResult, OutputStreams } from "./runner/formatFiles";
export { FormatRunOptionsSchema } from "./runner/options.schema";
export type { FormatRunOptions } from "./runner/options.schema";
export { validateAndNormalizeRunOptions } from "./runner/validateAndNormalizeRunOptions";
export { FileNotFoundError, CliUsageError } from "./runner/errors";
export { Logger } from "./runner/Logger";
export type { LogLevel } from "./runner/Logger";

export { runCli, USAGE_ERROR_EXIT_CODE } from "./cli/runCli";
export { parseCliArgs } from "./cli/parseCliArgs";
