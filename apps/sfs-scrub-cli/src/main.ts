import { CommanderError } from "commander";
import { EXIT_OK, exitCodeFor } from "@sfs-scrub/core";

import { createProgram } from "./program.js";
import { consoleReporter, type Reporter } from "./reporter.js";

/**
 * Run the command line and return the process exit status
 */
export function main(argv: readonly string[], reporter: Reporter = consoleReporter): number {
    const program = createProgram(reporter).exitOverride();

    try {
        program.parse([...argv]);
        return EXIT_OK;
    } catch (error) {
        // commander has already printed usage errors, help and the version
        if (error instanceof CommanderError) return error.exitCode;

        const message = error instanceof Error ? error.message : String(error);
        reporter.error(`An error was encountered and file editing was aborted: ${message}`);
        return exitCodeFor(error);
    }
}
