import yargs from "yargs";
import dedent from "ts-dedent";
import { CliUsageError } from "../runner/errors";
import { FormatRunOptions } from "../runner/options.schema";
import { validateAndNormalizeRunOptions } from "../runner/validateAndNormalizeRunOptions";

const USAGE = dedent`
    $0 <file>... [--verbose|-v] [--inplace|-i]

    Rewrites // line comments as /* */ block comments. Consecutive comment
    lines are grouped into one block; a comment on its own becomes an inline
    block comment.
`;

/**
 * Turn command-line arguments (without the node and script entries) into
 * run options.
 *
 * Returns undefined when yargs handled the invocation itself (--help, --version),
 * even if files were named too.
 * Throws CliUsageError for unknown options or when no file is named.
 */
export function parseCliArgs(argv: readonly string[]): FormatRunOptions | undefined {
    const parsed = yargs([...argv])
        .scriptName("line-comment-normalizer")
        .usage(USAGE)
        .parserConfiguration({ "parse-positional-numbers": false })
        .option("verbose", {
            alias: "v",
            type: "boolean",
            default: false,
            describe: "report progress and skipped duplicates on stderr",
        })
        .option("inplace", {
            alias: "i",
            type: "boolean",
            default: false,
            describe: "overwrite each file instead of printing to stdout",
        })
        .help("help", "show help")
        .alias("help", "h")
        .demandCommand(1, "at least one file is required")
        .strict()
        .exitProcess(false)
        .fail((message, err) => {
            if (err) throw err;
            throw new CliUsageError(message);
        })
        .parseSync();

    // yargs already printed help or the version; files named alongside are not touched.
    if (parsed.help === true || parsed.version === true) return undefined;

    return validateAndNormalizeRunOptions({
        files: parsed._.map(String),
        verbose: parsed.verbose,
        inplace: parsed.inplace,
    });
}
