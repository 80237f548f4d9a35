/**
 * Command-line definition
 */

import { Command } from "commander";
import { PART_BLOCK_KEY, PART_NAME_KEY } from "@sfs-scrub/core";

import { DEFAULT_SUFFIX } from "./outputPath.js";
import { consoleReporter, type Reporter } from "./reporter.js";
import { scrubFile } from "./scrubFile.js";

export const VERSION = "0.1.0";

interface CliOptions {
    suffix: string;
    output?: string;
    force: boolean;
    counts: boolean;
    partKey: string;
    nameKey: string;
}

export function createProgram(reporter: Reporter = consoleReporter): Command {
    const program = new Command();

    program
        .name("sfs-scrub")
        .description("Remove parts by name from a KSP save or craft file, or list the parts it contains")
        .version(VERSION)
        .argument("<file>", "save file to read")
        .argument("[parts...]", "names of parts to remove; omit to list the part names")
        .option("-s, --suffix <suffix>", "marker inserted before the output file's extension (only used when part names are given)", DEFAULT_SUFFIX)
        .option("-o, --output <path>", "write the cleaned file to this path instead (only used when part names are given)")
        .option("-f, --force", "overwrite an existing output file (only used when part names are given)", false)
        .option("-c, --counts", "list each part name with its number of occurrences", false)
        .option("--part-key <key>", "block key of a part record", PART_BLOCK_KEY)
        .option("--name-key <key>", "field holding a part's name", PART_NAME_KEY)
        .configureOutput({
            writeOut: (text) => reporter.info(text.trimEnd()),
            writeErr: (text) => reporter.error(text.trimEnd()),
        })
        .action((file: string, parts: string[], options: CliOptions) => {
            scrubFile({
                inputPath: file,
                partNames: parts,
                outputPath: options.output,
                suffix: options.suffix,
                force: options.force,
                counts: options.counts,
                schema: { partKey: options.partKey, nameKey: options.nameKey },
                reporter,
            });
        });

    return program;
}
