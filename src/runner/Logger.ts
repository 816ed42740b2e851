import { z } from "zod";

// -----------------------------
// Logging support
// -----------------------------

/**
 * Standard output carries formatted source, so every channel below
 * writes to the error stream (console.error / console.warn).
 */

const LogLevelSchema = z.enum(["silent", "info", "debug"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const PREFIX = "[line-comment-normalizer]";

let currentLevel: LogLevel = "silent";

/**
 * Reads the LOGLEVEL environment override, if any.
 *
 * Throws on values outside LogLevel so a typo is not silently ignored.
 */
function readEnvOverride(): LogLevel | undefined {
    const raw = process.env.LOGLEVEL;
    if (raw === undefined || raw === "") return undefined;

    const parsed = LogLevelSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(
            `Invalid LOGLEVEL value '${raw}'. ` +
            `Expected one of: ${LogLevelSchema.options.join(", ")}`
        );
    }
    return parsed.data;
}

export const Logger = {
    setLevel(level: LogLevel): void {
        const override = readEnvOverride();

        if (override === undefined) {
            currentLevel = level;
            return;
        }

        currentLevel = override;
        if (override !== "silent") {
            console.warn(
                `${PREFIX}[warn] Log level overridden via environment variable LOGLEVEL=${override}`
            );
        }
    },

    getLevel(): LogLevel {
        return currentLevel;
    },

    info(message: string): void {
        if (currentLevel === "info" || currentLevel === "debug") {
            console.error(`${PREFIX} ${message}`);
        }
    },

    debug(message: string): void {
        if (currentLevel === "debug") {
            console.error(`${PREFIX}[debug] ${message}`);
        }
    },

    warn(message: string): void {
        console.warn(`${PREFIX}[warn] ${message}`);
    },

    error(message: string): void {
        console.error(`${PREFIX}[error] ${message}`);
    }
};
