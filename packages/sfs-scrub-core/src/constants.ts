import type { DocumentFormat, PartSchema } from "./types.js";

/**
 * Block key of a vessel part record
 */
export const PART_BLOCK_KEY = "PART";

/**
 * Field holding a part's name
 */
export const PART_NAME_KEY = "name";

export const DEFAULT_PART_SCHEMA: PartSchema = {
    partKey: PART_BLOCK_KEY,
    nameKey: PART_NAME_KEY,
};

export const OPEN_BRACE = "{";
export const CLOSE_BRACE = "}";
export const BOM = "\uFEFF";

/**
 * Used when the source has no nested content to take the indent from
 */
export const DEFAULT_FORMAT: DocumentFormat = {
    indent: "\t",
    newline: "\n",
    finalNewline: true,
    bom: false,
};
