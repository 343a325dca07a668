// CHANGE: Parse a whole tree dump into an identifier-indexed tree with an explicit root
// PURITY: CORE (the entry map is built locally and never escapes mutable)
// INVARIANT: rootId = identifier of the first non-blank line; identifiers are unique
// COMPLEXITY: O(n) where n = |text|

import { Effect } from "effect";

import {
	DuplicateIdentifier,
	NodelessTree,
	type ParseError,
	UnparsableLine,
} from "../errors.js";
import type { TreeEntry } from "../models.js";
import { blankLineSkipped, type Diagnostic } from "../types/diagnostics.js";
import type { ParsedTree } from "../types/tree.js";
import { lineIdentifier, parseLine } from "./line.js";

/**
 * Parser output together with the diagnostics it produced.
 */
export interface ParseOutcome {
	readonly tree: ParsedTree;
	readonly diagnostics: ReadonlyArray<Diagnostic>;
}

/**
 * Splits text into lines; a trailing line terminator does not open an extra line.
 *
 * @pure true
 * @example splitLines("a\n\nb\n") → ["a", "", "b"]
 */
export function splitLines(text: string): ReadonlyArray<string> {
	const lines = text.split(/\r\n|\n|\r/u);
	if (lines.at(-1) === "") {
		lines.pop();
	}
	return lines;
}

/**
 * Parses a tree dump.
 *
 * Blank lines are skipped and reported as BlankLineSkipped with their 0-based
 * index. The identifier of each line is checked for repeats before the rest of
 * the line is parsed.
 *
 * @param text Raw multi-line dump
 *
 * @pure true
 * @effect Effect<ParseOutcome, ParseError>
 * @invariant outcome.tree.entries.has(outcome.tree.rootId)
 *
 * @example
 * ```ts
 * const { tree } = Effect.runSync(parseTree([
 *   "0:[device_type=pc] yes=1,no=2",
 *   "1:leaf=0.1",
 *   "2:leaf=0.2",
 * ].join("\n")));
 * // tree.rootId === "0", tree.entries.size === 3
 * ```
 */
export function parseTree(text: string): Effect.Effect<ParseOutcome, ParseError> {
	return Effect.gen(function* () {
		const entries = new Map<string, TreeEntry>();
		const diagnostics: Diagnostic[] = [];
		let rootId: string | undefined;

		for (const [lineIndex, rawLine] of splitLines(text).entries()) {
			const line = rawLine.trim();
			if (line.length === 0) {
				diagnostics.push(blankLineSkipped(lineIndex));
				continue;
			}

			const id = lineIdentifier(line);
			if (id === undefined) {
				return yield* Effect.fail(
					new UnparsableLine({ line, reason: "missing node identifier" }),
				);
			}
			if (entries.has(id)) {
				return yield* Effect.fail(new DuplicateIdentifier({ id }));
			}

			entries.set(id, yield* parseLine(line));
			rootId ??= id;
		}

		if (rootId === undefined) {
			return yield* Effect.fail(
				new NodelessTree({ detail: "input contains no tree entries" }),
			);
		}

		const tree: ParsedTree = { rootId, entries };
		return { tree, diagnostics };
	});
}
