import { describe, expect, it } from "vitest";

import { MalformedInputError } from "./errors.js";
import { parseDocument } from "./parser.js";
import { SAMPLE_SAVE } from "./testing/sampleSave.js";
import type { BlockNode, Node } from "./types.js";

function asBlock(node: Node | undefined): BlockNode {
    if (node?.kind !== "block") throw new Error(`Expected a block, got ${node?.kind}`);
    return node;
}

function parseError(text: string): MalformedInputError {
    try {
        parseDocument(text);
    } catch (error) {
        if (error instanceof MalformedInputError) return error;
        throw error;
    }
    throw new Error("Expected parseDocument to throw");
}

describe("parseDocument", () => {
    describe("structure", () => {
        it("should parse nested blocks and fields in order", () => {
            const doc = parseDocument(SAMPLE_SAVE);

            expect(doc.nodes).toHaveLength(1);
            const game = asBlock(doc.nodes[0]);
            expect(game.key).toBe("GAME");
            expect(game.children.map(c => c.kind)).toEqual(["field", "field", "block"]);
            expect(game.children[0]).toEqual({ kind: "field", key: "version", value: "1.12.5" });

            const flightState = asBlock(game.children[2]);
            expect(flightState.key).toBe("FLIGHTSTATE");
            const vessels = flightState.children.filter(c => c.kind === "block");
            expect(vessels).toHaveLength(2);

            const kerbalX = asBlock(vessels[0]);
            expect(kerbalX.children[0]).toEqual({ kind: "field", key: "name", value: "Kerbal X" });
            expect(kerbalX.children.filter(c => c.kind === "block")).toHaveLength(4);
        });

        it("should parse several top-level nodes", () => {
            const doc = parseDocument(["ship = Untitled Space Craft", "PART", "{", "\tname = mk1pod.v2", "}"].join("\n"));

            expect(doc.nodes).toEqual([
                { kind: "field", key: "ship", value: "Untitled Space Craft" },
                {
                    kind: "block",
                    key: "PART",
                    children: [{ kind: "field", key: "name", value: "mk1pod.v2" }],
                },
            ]);
        });

        it("should keep an empty block", () => {
            const doc = parseDocument("ACTIONS\n{\n}\n");
            expect(doc.nodes).toEqual([{ kind: "block", key: "ACTIONS", children: [] }]);
        });

        it("should return no nodes for empty input", () => {
            const doc = parseDocument("");
            expect(doc.nodes).toEqual([]);
            expect(doc.format.finalNewline).toBe(false);
        });
    });

    describe("fields", () => {
        it("should split on the first equals sign only", () => {
            const doc = parseDocument("expr = a = b\n");
            expect(doc.nodes[0]).toEqual({ kind: "field", key: "expr", value: "a = b" });
        });

        it("should accept fields without spaces around the equals sign", () => {
            const doc = parseDocument("key=value\n");
            expect(doc.nodes[0]).toEqual({ kind: "field", key: "key", value: "value" });
        });

        it("should keep an empty value", () => {
            const doc = parseDocument("description = \n");
            expect(doc.nodes[0]).toEqual({ kind: "field", key: "description", value: "" });
        });

        it("should keep extra spacing inside the value", () => {
            const doc = parseDocument("pos =  1,2,3 \n");
            expect(doc.nodes[0]).toEqual({ kind: "field", key: "pos", value: " 1,2,3 " });
        });
    });

    describe("raw lines", () => {
        it("should keep blank lines and comments verbatim", () => {
            const doc = parseDocument(["GAME", "{", "", "\t// keep me", "\tversion = 1", "}"].join("\n"));
            const game = asBlock(doc.nodes[0]);

            expect(game.children).toEqual([
                { kind: "raw", text: "" },
                { kind: "raw", text: "\t// keep me" },
                { kind: "field", key: "version", value: "1" },
            ]);
        });

        it("should treat a bare word without a following brace as raw", () => {
            const doc = parseDocument(["GAME", "{", "\tORPHAN", "\tversion = 1", "}"].join("\n"));
            const game = asBlock(doc.nodes[0]);

            expect(game.children[0]).toEqual({ kind: "raw", text: "\tORPHAN" });
        });
    });

    describe("format detection", () => {
        it("should record tab indentation and a final newline", () => {
            const doc = parseDocument(SAMPLE_SAVE);
            expect(doc.format).toEqual({ indent: "\t", newline: "\n", finalNewline: true, bom: false });
        });

        it("should record space indentation", () => {
            const doc = parseDocument(["GAME", "{", "    version = 1", "}"].join("\n"));
            expect(doc.format.indent).toBe("    ");
            expect(doc.format.finalNewline).toBe(false);
        });

        it("should fall back to a tab when nothing is nested", () => {
            const doc = parseDocument("version = 1\n");
            expect(doc.format.indent).toBe("\t");
        });

        it("should detect CRLF line endings and a byte-order mark", () => {
            const doc = parseDocument("\uFEFFGAME\r\n{\r\n\tversion = 1\r\n}\r\n");

            expect(doc.format).toEqual({ indent: "\t", newline: "\r\n", finalNewline: true, bom: true });
            expect(asBlock(doc.nodes[0]).children[0]).toEqual({ kind: "field", key: "version", value: "1" });
        });
    });

    describe("malformed input", () => {
        it("should reject a closing brace with no open block", () => {
            const error = parseError(["GAME", "{", "}", "}"].join("\n"));

            expect(error.line).toBe(4);
            expect(error.message).toBe("Closing brace without an open block (line 4)");
            expect(error.operation).toBe("parse");
        });

        it("should reject an opening brace without a block key", () => {
            const error = parseError(["GAME", "x = 1", "{", "}"].join("\n"));

            expect(error.line).toBe(3);
            expect(error.message).toBe("Opening brace without a block key (line 3)");
        });

        it("should reject a block that is never closed", () => {
            const error = parseError(["GAME", "{", "\tVESSEL", "\t{", "\t\tname = x", "\t}"].join("\n"));

            expect(error.line).toBe(1);
            expect(error.message).toBe('Block "GAME" is never closed (line 1)');
        });
    });
});
