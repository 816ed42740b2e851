#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli/runCli";
import { Logger } from "./runner/Logger";

try {
    process.exitCode = runCli(hideBin(process.argv));
} catch (err) {
    Logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
}
