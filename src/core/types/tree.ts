// CHANGE: Intermediate tree shapes between parser, normalizer and enumerator
// PURITY: CORE
// INVARIANT: Every structure is created per conversion and never mutated
// COMPLEXITY: O(1) - type declarations only

import type { Condition, Leaf, TreeEntry } from "../models.js";

/**
 * Parser output.
 *
 * @property rootId Identifier of the first non-blank line; conversion starts here
 * @property entries Identifier → leaf or decision node, in input order
 *
 * @invariant entries.has(rootId)
 */
export interface ParsedTree {
	readonly rootId: string;
	readonly entries: ReadonlyMap<string, TreeEntry>;
}

/**
 * Sentinel for a path that would only repeat a strategy reachable by a
 * shorter conjunction. Enumeration stops here without emitting.
 */
export interface RedundantPath {
	readonly _tag: "RedundantPath";
}

export const redundantPath: RedundantPath = { _tag: "RedundantPath" };

/**
 * Binary test on one condition.
 *
 * @property whenTrue Branch taken when `condition` holds
 * @property whenFalse Branch taken when its negation holds
 */
export interface ConditionSplit {
	readonly condition: Condition;
	readonly whenTrue: BinaryBranch;
	readonly whenFalse: BinaryBranch;
}

/**
 * Decision point of the OR-free tree. A plain node yields one split; an OR
 * node yields two sibling splits, one per operand, both leading to `yes`.
 */
export interface BinaryDecision {
	readonly _tag: "BinaryDecision";
	readonly splits: readonly [ConditionSplit] | readonly [ConditionSplit, ConditionSplit];
}

/**
 * Node of the binary condition-tree.
 */
export type BinaryBranch = BinaryDecision | Leaf | RedundantPath;
