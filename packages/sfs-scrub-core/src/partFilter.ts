/**
 * Part removal and part listing
 *
 * Parts refer to their siblings by position (`parent`, `sym`, `srfN`, `attN`).
 * Those indices are left as they are after a removal.
 */

import { DEFAULT_PART_SCHEMA } from "./constants.js";
import { getField, getPartName, walkBlocks } from "./traversal.js";
import type { BlockNode, Document, Node, PartSchema, PurgeReport, RemovalSet } from "./types.js";

/**
 * Field naming the block that owns parts (a vessel's name)
 */
export const CONTAINER_NAME_KEY = "name";

/**
 * Remove every part block whose name is in `removalSet`, together with
 * everything nested inside it. Mutates the document in place.
 *
 * A set with no matching names leaves the document unchanged and reports
 * zero removals.
 */
export function purgeParts(
    document: Document,
    removalSet: RemovalSet,
    schema: PartSchema = DEFAULT_PART_SCHEMA
): PurgeReport {
    const report: PurgeReport = { removed: 0, containers: [] };
    if (removalSet.size === 0) return report;

    function shouldRemove(node: Node): boolean {
        const name = getPartName(node, schema);
        return name !== undefined && removalSet.has(name);
    }

    function purge(owner: BlockNode | null, children: Node[]): Node[] {
        const kept = children.filter(child => !shouldRemove(child));
        const removed = children.length - kept.length;

        if (removed > 0) {
            report.removed += removed;
            report.containers.push({
                key: owner ? owner.key : null,
                name: owner ? getField(owner, CONTAINER_NAME_KEY) : undefined,
                removed,
            });
        }

        for (const child of kept) {
            if (child.kind === "block") {
                child.children = purge(child, child.children);
            }
        }
        return kept;
    }

    document.nodes = purge(null, document.nodes);
    return report;
}

/**
 * Number of part blocks per part name, in first-seen order
 */
export function countParts(
    document: Document,
    schema: PartSchema = DEFAULT_PART_SCHEMA
): Map<string, number> {
    const counts = new Map<string, number>();
    for (const block of walkBlocks(document.nodes)) {
        const name = getPartName(block, schema);
        if (name === undefined) continue;
        counts.set(name, (counts.get(name) ?? 0) + 1);
    }
    return counts;
}

/**
 * Distinct part names, sorted lexicographically
 */
export function listPartNames(
    document: Document,
    schema: PartSchema = DEFAULT_PART_SCHEMA
): string[] {
    return [...countParts(document, schema).keys()].sort();
}
