// CHANGE: Specs for whole-dump parsing
// PURITY: CORE
// INVARIANT: rootId = first non-blank line; duplicate identifiers fail; blank lines are reported

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { parseTree, splitLines } from "../../../src/core/parser/tree.js";
import { treeText } from "../../utils/builders.js";

describe("splitLines", () => {
	it("drops the empty piece after a trailing terminator", () => {
		expect(splitLines("a\n\nb\n")).toEqual(["a", "", "b"]);
	});

	it("accepts CRLF and CR terminators", () => {
		expect(splitLines("a\r\nb\rc")).toEqual(["a", "b", "c"]);
	});

	it("returns no lines for empty text", () => {
		expect(splitLines("")).toEqual([]);
	});
});

describe("parseTree", () => {
	it("indexes every entry and takes the first line as root", () => {
		const { tree, diagnostics } = Effect.runSync(
			parseTree(treeText("5:leaf=0.1", "0:[os=linux] yes=5,no=6", "6:leaf=0.2")),
		);
		expect(tree.rootId).toBe("5");
		expect([...tree.entries.keys()]).toEqual(["5", "0", "6"]);
		expect(diagnostics).toEqual([]);
	});

	it("trims surrounding whitespace", () => {
		const { tree } = Effect.runSync(
			parseTree(treeText("  0:[os=linux] yes=1,no=2", "\t1:leaf=0.1  ", "2:leaf=0.2")),
		);
		expect(tree.rootId).toBe("0");
		expect(tree.entries.get("1")?._tag).toBe("Leaf");
	});

	it("reports skipped blank lines with their index", () => {
		const { tree, diagnostics } = Effect.runSync(
			parseTree("\n  1:leaf=0.0\n\n    "),
		);
		expect(tree.rootId).toBe("1");
		expect(diagnostics).toEqual([
			{ _tag: "BlankLineSkipped", lineIndex: 0 },
			{ _tag: "BlankLineSkipped", lineIndex: 2 },
			{ _tag: "BlankLineSkipped", lineIndex: 3 },
		]);
	});

	it("fails on a repeated identifier, whatever the entry kinds", () => {
		const nodeThenLeaf = Effect.runSync(
			Effect.flip(parseTree(treeText("0:[os=linux] yes=1,no=2", "0:leaf=0.1"))),
		);
		const leafThenLeaf = Effect.runSync(
			Effect.flip(parseTree(treeText("1:leaf=0.1", "1:leaf=0.1"))),
		);
		expect(nodeThenLeaf._tag).toBe("DuplicateIdentifier");
		expect(leafThenLeaf._tag).toBe("DuplicateIdentifier");
		if (nodeThenLeaf._tag === "DuplicateIdentifier") {
			expect(nodeThenLeaf.id).toBe("0");
		}
	});

	it("checks repeats before parsing the rest of the line", () => {
		const error = Effect.runSync(
			Effect.flip(parseTree(treeText("1:leaf=0.1", "1:garbage"))),
		);
		expect(error._tag).toBe("DuplicateIdentifier");
	});

	it("fails on a line without identifier", () => {
		const error = Effect.runSync(Effect.flip(parseTree("leaf=0.1")));
		expect(error._tag).toBe("UnparsableLine");
		if (error._tag === "UnparsableLine") {
			expect(error.reason).toBe("missing node identifier");
		}
	});

	it("fails on a malformed line", () => {
		const error = Effect.runSync(
			Effect.flip(parseTree(treeText("0:[os=linux] yes=1,no=2", "1:leef=0.1"))),
		);
		expect(error._tag).toBe("UnparsableLine");
		if (error._tag === "UnparsableLine") {
			expect(error.line).toBe("1:leef=0.1");
		}
	});

	it("fails with NodelessTree on blank input", () => {
		const error = Effect.runSync(Effect.flip(parseTree("\n  \n")));
		expect(error._tag).toBe("NodelessTree");
	});
});
