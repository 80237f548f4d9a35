/**
 * Public types for sfs-scrub-core
 */


// ============================================================================
// Node Types
// ============================================================================

/**
 * Brace-delimited block, e.g. `VESSEL { ... }`.
 * Children keep their source order.
 */
export interface BlockNode {
    kind: "block";
    key: string;
    children: Node[];
}

/**
 * `key = value` line
 */
export interface FieldNode {
    kind: "field";
    key: string;
    value: string;
}

/**
 * Blank or unrecognized line, kept verbatim (including its indentation)
 */
export interface RawNode {
    kind: "raw";
    text: string;
}

/**
 * Union type for all node types
 */
export type Node = BlockNode | FieldNode | RawNode;


// ============================================================================
// Document
// ============================================================================

/**
 * Formatting observed in the source text, reused when serializing
 */
export interface DocumentFormat {
    /** Indentation added per nesting level */
    indent: string;
    /** Line terminator */
    newline: "\n" | "\r\n";
    /** Whether the source ended with a line terminator */
    finalNewline: boolean;
    /** Whether the source started with a UTF-8 byte-order mark */
    bom: boolean;
}

/**
 * A whole save file: top-level nodes plus formatting metadata
 */
export interface Document {
    nodes: Node[];
    format: DocumentFormat;
}


// ============================================================================
// Part Records
// ============================================================================

/**
 * Which block key marks a part and which field names it
 */
export interface PartSchema {
    partKey: string;
    nameKey: string;
}

/**
 * Part names to remove. Matching is exact and case-sensitive.
 */
export type RemovalSet = ReadonlySet<string>;

/**
 * Parts removed from one owning block (normally a VESSEL)
 */
export interface ContainerPurge {
    /** null when the parts sat at the top level (craft files) */
    key: string | null;
    /** The container's own name field, if it has one */
    name: string | undefined;
    removed: number;
}

export interface PurgeReport {
    removed: number;
    containers: ContainerPurge[];
}
