// CHANGE: Parse a single trimmed line of a tree dump into a leaf or a decision node
// PURITY: CORE
// INVARIANT: Dispatch is by grammar; anything matching neither grammar is UnparsableLine
// COMPLEXITY: O(n) where n = |line|

import { Effect } from "effect";

import type {
	InvalidLeafValue,
	UnsupportedCombinator,
} from "../errors.js";
import { UnparsableLine } from "../errors.js";
import { DecisionNode, type Leaf, makeLeaf, type TreeEntry } from "../models.js";
import { parseConditionExpression } from "./condition.js";

const LEAF_LINE_PATTERN = /^([^:\s]+):leaf=(\S+)$/u;
const NODE_LINE_PATTERN =
	/^([^:\s]+):\[([^\]]*)\]\s+yes=([^,\s]+),no=([^,\s]+)$/u;
const FLOAT_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/u;

export type LineError = UnparsableLine | UnsupportedCombinator | InvalidLeafValue;

/**
 * Identifier of a line: the text before its first ":".
 *
 * @pure true
 * @returns undefined when the line has no ":" or starts with it
 */
export function lineIdentifier(line: string): string | undefined {
	const colonIndex = line.indexOf(":");
	return colonIndex > 0 ? line.slice(0, colonIndex) : undefined;
}

function parseLeafLine(
	line: string,
	rawValue: string,
): Effect.Effect<Leaf, UnparsableLine | InvalidLeafValue> {
	if (!FLOAT_PATTERN.test(rawValue)) {
		return Effect.fail(
			new UnparsableLine({ line, reason: `leaf value "${rawValue}" is not a number` }),
		);
	}
	return makeLeaf(Number.parseFloat(rawValue));
}

/**
 * Parses `<id>:leaf=<float>` or `<id>:[<expr>] yes=<id>,no=<id>`.
 *
 * @param line Line with surrounding whitespace already removed
 *
 * @pure true
 * @effect Effect<TreeEntry, LineError>
 *
 * @example
 * ```ts
 * parseLine("0:leaf=0.25");                      // Leaf { value: 0.25 }
 * parseLine("0:[device_type=pc] yes=1,no=2");   // DecisionNode { yes: "1", no: "2", ... }
 * ```
 */
export function parseLine(line: string): Effect.Effect<TreeEntry, LineError> {
	const leafMatch = LEAF_LINE_PATTERN.exec(line);
	if (leafMatch !== null) {
		return parseLeafLine(line, leafMatch[2] ?? "");
	}

	const nodeMatch = NODE_LINE_PATTERN.exec(line);
	if (nodeMatch === null) {
		return Effect.fail(
			new UnparsableLine({ line, reason: "matches neither leaf nor node grammar" }),
		);
	}

	const [, , expression = "", yes = "", no = ""] = nodeMatch;
	return parseConditionExpression(expression, line).pipe(
		Effect.map((conditions) => new DecisionNode({ conditions, yes, no })),
	);
}
