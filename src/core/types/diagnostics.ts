// CHANGE: Non-fatal events observed during a conversion, returned as data
// PURITY: CORE
// INVARIANT: A diagnostic never aborts a conversion
// COMPLEXITY: O(1) - type declarations only

import type { Condition, Strategy } from "../models.js";

/**
 * A blank line was skipped by the parser.
 *
 * @property lineIndex 0-based index in the raw input
 */
export interface BlankLineSkipped {
	readonly _tag: "BlankLineSkipped";
	readonly lineIndex: number;
}

/**
 * A strategy whose conjunction can never hold was discarded.
 *
 * @property conflict The first pair of conditions found to contradict
 */
export interface AlwaysFalseStrategy {
	readonly _tag: "AlwaysFalseStrategy";
	readonly strategy: Strategy;
	readonly conflict: readonly [Condition, Condition];
}

export type Diagnostic = BlankLineSkipped | AlwaysFalseStrategy;

export const blankLineSkipped = (lineIndex: number): BlankLineSkipped => ({
	_tag: "BlankLineSkipped",
	lineIndex,
});

export const alwaysFalseStrategy = (
	strategy: Strategy,
	conflict: readonly [Condition, Condition],
): AlwaysFalseStrategy => ({
	_tag: "AlwaysFalseStrategy",
	strategy,
	conflict,
});
