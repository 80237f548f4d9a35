/**
 * read → parse → filter → serialize → write
 */

import { resolve } from "path";
import {
    countParts,
    DEFAULT_PART_SCHEMA,
    FileAccessError,
    listPartNames,
    parseDocument,
    purgeParts,
    serializeDocument,
    type ContainerPurge,
    type PartSchema,
    type PurgeReport,
} from "@sfs-scrub/core";

import { cleanedOutputPath, DEFAULT_SUFFIX } from "./outputPath.js";
import { ensureWritable, readSaveFile, writeSaveFile } from "./persistence.js";
import { consoleReporter, type Reporter } from "./reporter.js";

export interface ScrubOptions {
    inputPath: string;
    /** Names of parts to remove; empty lists the parts instead */
    partNames: readonly string[];
    /** Explicit output path, overrides `suffix` */
    outputPath?: string;
    suffix?: string;
    /** Replace an existing output file */
    force?: boolean;
    /** Listing mode: print `name<TAB>count` */
    counts?: boolean;
    schema?: PartSchema;
    reporter?: Reporter;
}

export type ScrubResult =
    | { mode: "list"; names: string[] }
    | { mode: "purge"; outputPath: string; report: PurgeReport };

export const UNRENUMBERED_WARNING =
    "Warning: index references between parts (parent, sym, srfN, attN) were not renumbered";

function describeContainer(container: ContainerPurge): string {
    return container.name ?? container.key ?? "the top level";
}

/**
 * List the parts of a save file, or write a copy without the named parts.
 * Throws FileAccessError or MalformedInputError before anything is written.
 */
export function scrubFile(options: ScrubOptions): ScrubResult {
    const reporter = options.reporter ?? consoleReporter;
    const schema = options.schema ?? DEFAULT_PART_SCHEMA;

    const document = parseDocument(readSaveFile(options.inputPath));

    if (options.partNames.length === 0) {
        const names = listPartNames(document, schema);
        if (options.counts) {
            const counts = countParts(document, schema);
            for (const name of names) reporter.info(`${name}\t${counts.get(name) ?? 0}`);
        } else {
            for (const name of names) reporter.info(name);
        }
        return { mode: "list", names };
    }

    const outputPath = options.outputPath ?? cleanedOutputPath(options.inputPath, options.suffix ?? DEFAULT_SUFFIX);
    if (resolve(outputPath) === resolve(options.inputPath)) {
        throw new FileAccessError(`Output would replace the input file: ${outputPath}`, outputPath);
    }
    const overwrite = options.force ?? false;
    ensureWritable(outputPath, overwrite);

    reporter.info(`Purging parts with names: ${options.partNames.join(", ")}`);
    const report = purgeParts(document, new Set(options.partNames), schema);

    for (const container of report.containers) {
        reporter.info(`Deleted ${container.removed} parts from ${describeContainer(container)}`);
    }
    if (report.removed === 0) {
        reporter.info("No parts matched; output is unchanged.");
    } else {
        reporter.error(UNRENUMBERED_WARNING);
    }

    writeSaveFile(outputPath, serializeDocument(document), overwrite);
    reporter.info(`Wrote scrubbed file to: ${outputPath}`);

    return { mode: "purge", outputPath, report };
}
