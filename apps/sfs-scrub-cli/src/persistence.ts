/**
 * Save-file access for the command line
 *
 * Reads the whole input at once and writes the output in a single call, so a
 * failure never leaves a partial file behind.
 */

import { existsSync, readFileSync, statSync, writeFileSync } from "fs";
import { TextDecoder } from "util";
import { FileAccessError } from "@sfs-scrub/core";

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function hasCode(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Read a save file as UTF-8 text. Invalid UTF-8 is an error, never replaced.
 */
export function readSaveFile(path: string): string {
    let bytes: Buffer;
    try {
        if (!statSync(path).isFile()) {
            throw new FileAccessError(`No such file: ${path}`, path);
        }
        bytes = readFileSync(path);
    } catch (error) {
        if (error instanceof FileAccessError) throw error;
        if (hasCode(error, "ENOENT")) throw new FileAccessError(`No such file: ${path}`, path, error);
        throw new FileAccessError(`Cannot read ${path}: ${errorMessage(error)}`, path, error);
    }

    try {
        return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch (error) {
        throw new FileAccessError(`Cannot read ${path}: not valid UTF-8 text`, path, error);
    }
}

/**
 * Fail unless `path` is free to write (or `overwrite` is set)
 */
export function ensureWritable(path: string, overwrite: boolean): void {
    if (!overwrite && existsSync(path)) {
        throw new FileAccessError(
            `Output file already exists, move it or pass --force: ${path}`,
            path
        );
    }
}

/**
 * Write the cleaned save. Without `overwrite` an existing file is never replaced.
 */
export function writeSaveFile(path: string, text: string, overwrite: boolean): void {
    try {
        writeFileSync(path, text, { encoding: "utf8", flag: overwrite ? "w" : "wx" });
    } catch (error) {
        if (hasCode(error, "EEXIST")) {
            throw new FileAccessError(
                `Output file already exists, move it or pass --force: ${path}`,
                path,
                error
            );
        }
        throw new FileAccessError(`Cannot write ${path}: ${errorMessage(error)}`, path, error);
    }
}
