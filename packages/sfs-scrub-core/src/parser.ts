/**
 * Parser for the brace-nested `key = value` save format
 *
 * ```
 * GAME
 * {
 *     version = 1.12.5
 *     FLIGHTSTATE
 *     {
 *         ...
 *     }
 * }
 * ```
 */

import { BOM, CLOSE_BRACE, DEFAULT_FORMAT, OPEN_BRACE } from "./constants.js";
import { MalformedInputError } from "./errors.js";
import type { BlockNode, Document, DocumentFormat, FieldNode, Node } from "./types.js";

interface OpenBlock {
    block: BlockNode;
    line: number;
}

function leadingWhitespace(line: string): string {
    return line.slice(0, line.length - line.trimStart().length);
}

/**
 * Split `key = value`. Only the first `=` separates, and a single space after it
 * belongs to the separator, so the value round-trips as written.
 */
function parseField(line: string): FieldNode {
    const text = line.trimStart();
    const eq = text.indexOf("=");
    const rest = text.slice(eq + 1);
    return {
        kind: "field",
        key: text.slice(0, eq).trim(),
        value: rest.startsWith(" ") ? rest.slice(1) : rest,
    };
}

function isBlockOpener(line: string, next: string | undefined): boolean {
    return line.length > 0 && next !== undefined && next.trim() === OPEN_BRACE;
}

/**
 * Parse save-file text into a Document.
 *
 * Blank and unrecognized lines become raw nodes so nothing is lost on output.
 * Throws MalformedInputError on a stray `{` or `}` and on blocks left open at
 * the end of input.
 */
export function parseDocument(text: string): Document {
    const bom = text.startsWith(BOM);
    const body = bom ? text.slice(BOM.length) : text;

    const format: DocumentFormat = {
        ...DEFAULT_FORMAT,
        newline: body.includes("\r\n") ? "\r\n" : "\n",
        finalNewline: /\r?\n$/.test(body),
        bom,
    };

    if (body.length === 0) {
        return { nodes: [], format };
    }

    const lines = body.split(/\r?\n/);
    if (format.finalNewline) lines.pop();

    const nodes: Node[] = [];
    const stack: OpenBlock[] = [];
    let indent: string | undefined;

    for (let i = 0; i < lines.length; i++) {
        const raw = lines[i];
        const line = raw.trim();
        const lineNumber = i + 1;
        const top = stack.length > 0 ? stack[stack.length - 1] : undefined;
        const siblings = top ? top.block.children : nodes;

        if (line === CLOSE_BRACE) {
            if (!top) {
                throw new MalformedInputError("Closing brace without an open block", lineNumber);
            }
            stack.pop();
            continue;
        }

        if (line === OPEN_BRACE) {
            throw new MalformedInputError("Opening brace without a block key", lineNumber);
        }

        const isField = line.includes("=");
        const opensBlock = !isField && isBlockOpener(line, lines[i + 1]);

        if (indent === undefined && stack.length === 1 && (isField || opensBlock)) {
            const observed = leadingWhitespace(raw);
            if (observed.length > 0) indent = observed;
        }

        if (isField) {
            siblings.push(parseField(raw));
        } else if (opensBlock) {
            const block: BlockNode = { kind: "block", key: line, children: [] };
            siblings.push(block);
            stack.push({ block, line: lineNumber });
            // the `{` line belongs to the opener
            i++;
        } else {
            siblings.push({ kind: "raw", text: raw });
        }
    }

    const unclosed = stack.pop();
    if (unclosed) {
        throw new MalformedInputError(`Block "${unclosed.block.key}" is never closed`, unclosed.line);
    }

    if (indent !== undefined) format.indent = indent;
    return { nodes, format };
}
