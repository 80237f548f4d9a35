/**
 * Error types shared by the parser and the command line
 */

/**
 * Base error for scrub operations
 */
export class ScrubError extends Error {
    readonly operation: string;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        operation: string,
        context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "ScrubError";
        this.operation = operation;
        this.context = context;
    }
}

/**
 * The input text is not a well-formed save file (unbalanced or stray braces).
 * `line` is 1-based.
 */
export class MalformedInputError extends ScrubError {
    readonly line: number;

    constructor(message: string, line: number) {
        super(`${message} (line ${line})`, "parse", { line });
        this.name = "MalformedInputError";
        this.line = line;
    }
}

/**
 * A file could not be read or written
 */
export class FileAccessError extends ScrubError {
    readonly path: string;

    constructor(message: string, path: string, cause?: unknown) {
        super(message, "file", { path }, { cause });
        this.name = "FileAccessError";
        this.path = path;
    }
}

export const EXIT_OK = 0;
export const EXIT_FILE_ACCESS = 1;
export const EXIT_FAILURE = 2;

/**
 * Process exit status for an error raised while scrubbing
 */
export function exitCodeFor(error: unknown): number {
    if (error instanceof FileAccessError) return EXIT_FILE_ACCESS;
    return EXIT_FAILURE;
}
