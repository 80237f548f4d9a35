import { join, parse } from "path";

/**
 * Marker inserted before the extension of the cleaned file
 */
export const DEFAULT_SUFFIX = "cleaned";

/**
 * Path of the cleaned copy, next to the input:
 * `saves/default/persistent.sfs` → `saves/default/persistent.cleaned.sfs`
 */
export function cleanedOutputPath(inputPath: string, suffix: string = DEFAULT_SUFFIX): string {
    const { dir, name, ext } = parse(inputPath);
    return join(dir, `${name}.${suffix}${ext}`);
}
