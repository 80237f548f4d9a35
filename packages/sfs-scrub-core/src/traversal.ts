/**
 * Read-only helpers for walking the node tree
 */

import type { BlockNode, Node, PartSchema } from "./types.js";

/**
 * Walk every block depth-first, in document order.
 */
export function* walkBlocks(nodes: readonly Node[]): Generator<BlockNode> {
    for (const node of nodes) {
        if (node.kind !== "block") continue;
        yield node;
        yield* walkBlocks(node.children);
    }
}

/**
 * Value of the first direct field with this key.
 * Keys repeat in this format, so later duplicates are ignored.
 */
export function getField(block: BlockNode, key: string): string | undefined {
    for (const child of block.children) {
        if (child.kind === "field" && child.key === key) return child.value;
    }
    return undefined;
}

/**
 * Name of a part block, or undefined when the node is not a named part
 */
export function getPartName(node: Node, schema: PartSchema): string | undefined {
    if (node.kind !== "block" || node.key !== schema.partKey) return undefined;
    return getField(node, schema.nameKey);
}
