import { FormatRunOptionsSchema, FormatRunOptions } from "./options.schema";

/**
 * Parse, validate, and normalize (i.e., apply defaults where field is missing) the caller-supplied run options.
 */
export function validateAndNormalizeRunOptions(input?: unknown): FormatRunOptions {
    // An absent input still goes through the schema so the error names `files`.
    return FormatRunOptionsSchema.parse(input ?? {});
}
