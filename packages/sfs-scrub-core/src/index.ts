/**
 * sfs-scrub-core
 *
 * Parse, filter and re-serialize brace-nested save files
 */

// Parse / serialize
export { parseDocument } from "./parser.js";
export { serializeDocument } from "./serializer.js";

// Part queries and removal
export { CONTAINER_NAME_KEY, countParts, listPartNames, purgeParts } from "./partFilter.js";
export { getField, getPartName, walkBlocks } from "./traversal.js";

export {
    DEFAULT_FORMAT,
    DEFAULT_PART_SCHEMA,
    PART_BLOCK_KEY,
    PART_NAME_KEY,
} from "./constants.js";

// Error handling
export {
    EXIT_FAILURE,
    EXIT_FILE_ACCESS,
    EXIT_OK,
    exitCodeFor,
    FileAccessError,
    MalformedInputError,
    ScrubError,
} from "./errors.js";

// Types
export type {
    BlockNode,
    ContainerPurge,
    Document,
    DocumentFormat,
    FieldNode,
    Node,
    PartSchema,
    PurgeReport,
    RawNode,
    RemovalSet,
} from "./types.js";
