/**
 * Where the command line sends its messages
 */
export interface Reporter {
    /** Results and progress (stdout) */
    info(message: string): void;
    /** Warnings and failures (stderr) */
    error(message: string): void;
}

export const consoleReporter: Reporter = {
    info: (message) => console.log(message),
    error: (message) => console.error(message),
};

/**
 * Reporter that keeps messages in memory
 */
export function createBufferedReporter(): Reporter & { out: string[]; err: string[] } {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        info: (message) => out.push(message),
        error: (message) => err.push(message),
    };
}
