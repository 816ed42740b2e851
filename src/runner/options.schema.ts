import { z } from "zod";

/**
 * Options for one formatting run.
 *
 * They control:
 *  - which files are rewritten
 *  - where the rewritten text goes
 *  - how much diagnostic output is produced
 *
 * This schema is the single source of truth for:
 *  - runtime validation
 *  - defaulting behavior
 *  - TypeScript type inference
 */
export const FormatRunOptionsSchema = z.object({
    /**
     * Paths of the source files to rewrite, in processing order.
     *
     * Paths are kept exactly as given; "a.c" and "./a.c" are different
     * entries as far as duplicate detection is concerned. An empty path is
     * accepted here and reported as not found when the run reaches it.
     */
    files: z
        .array(z.string())
        .min(1, "files must name at least one source file"),

    /**
     * Report progress and skipped duplicates on the error stream.
     */
    verbose: z
        .boolean()
        .default(false),

    /**
     * Overwrite each file with its rewritten text instead of printing it.
     */
    inplace: z
        .boolean()
        .default(false),
});

/**
 * Fully-resolved, runtime-valid run options.
 *
 * Notes:
 *  - All fields are guaranteed to be present
 *  - Defaults have already been applied
 */
export type FormatRunOptions =
    z.infer<typeof FormatRunOptionsSchema>;
