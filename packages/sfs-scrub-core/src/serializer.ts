import { BOM, CLOSE_BRACE, OPEN_BRACE } from "./constants.js";
import type { Document, Node } from "./types.js";

/**
 * Render a Document back to save-file text using the indentation, line
 * endings and BOM recorded by the parser.
 */
export function serializeDocument(document: Document): string {
    const { indent, newline, finalNewline, bom } = document.format;

    function serializeNode(node: Node, depth: number): string {
        const pad = indent.repeat(depth);

        if (node.kind === "raw") {
            return node.text;
        } else if (node.kind === "field") {
            return `${pad}${node.key} = ${node.value}`;
        }

        const lines = [`${pad}${node.key}`, `${pad}${OPEN_BRACE}`];
        for (const child of node.children) {
            lines.push(serializeNode(child, depth + 1));
        }
        lines.push(`${pad}${CLOSE_BRACE}`);
        return lines.join(newline);
    }

    let text = document.nodes.map(node => serializeNode(node, 0)).join(newline);
    if (finalNewline && document.nodes.length > 0) text += newline;
    return bom ? BOM + text : text;
}
