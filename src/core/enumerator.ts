// CHANGE: Enumerate root-to-leaf paths of the binary condition-tree as strategies
// PURITY: CORE (work stack and diagnostics are local accumulators)
// INVARIANT: Visit order is fixed (split order, true branch before false branch);
//            the resulting set does not depend on it
// COMPLEXITY: O(p · d) where p = paths, d = depth

import { HashSet, Option } from "effect";
import { match } from "ts-pattern";

import { findContradiction } from "./contradiction.js";
import { type Condition, negateCondition, Strategy } from "./models.js";
import {
	type ConversionOptions,
	defaultConversionOptions,
} from "./types/config.js";
import { alwaysFalseStrategy, type Diagnostic } from "./types/diagnostics.js";
import type { BinaryBranch, ConditionSplit } from "./types/tree.js";

/**
 * Strategies reached by the walk and the strategies it discarded.
 */
export interface EnumerationOutcome {
	readonly strategies: HashSet.HashSet<Strategy>;
	readonly diagnostics: ReadonlyArray<Diagnostic>;
}

interface PendingPath {
	readonly branch: BinaryBranch;
	readonly conditions: ReadonlyArray<Condition>;
}

const branchesOf = (
	split: ConditionSplit,
	conditions: ReadonlyArray<Condition>,
): readonly [PendingPath, PendingPath] => [
	{ branch: split.whenTrue, conditions: [...conditions, split.condition] },
	{
		branch: split.whenFalse,
		conditions: [...conditions, negateCondition(split.condition)],
	},
];

/**
 * Walks the binary condition-tree depth-first and collects one strategy per leaf.
 *
 * A true branch appends the split's condition, a false branch its negation.
 * RedundantPath ends a path silently. When `ignoreAlwaysFalseStrategies` is set,
 * a strategy with contradicting conditions is dropped and reported as
 * AlwaysFalseStrategy instead.
 *
 * The walk uses an explicit stack, so depth is bounded by memory only.
 *
 * @param root Binary condition-tree
 * @param options Conversion options
 *
 * @pure true
 * @invariant ∀ s ∈ result.strategies: options.ignoreAlwaysFalseStrategies → isSatisfiable(s)
 *
 * @example
 * ```ts
 * // device_type=pc ? 0.1 : 0.2
 * enumerateStrategies(tree).strategies;
 * // { [device_type=pc] → 0.1, [device_type!=pc] → 0.2 }
 * ```
 */
export function enumerateStrategies(
	root: BinaryBranch,
	options: ConversionOptions = defaultConversionOptions,
): EnumerationOutcome {
	let strategies = HashSet.empty<Strategy>();
	const diagnostics: Diagnostic[] = [];
	const pending: PendingPath[] = [{ branch: root, conditions: [] }];

	for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
		const { conditions } = next;
		match(next.branch)
			.with({ _tag: "RedundantPath" }, () => undefined)
			.with({ _tag: "Leaf" }, (leaf) => {
				const strategy = new Strategy({ conditions, leaf });
				const conflict = options.ignoreAlwaysFalseStrategies
					? findContradiction(conditions)
					: Option.none();
				if (Option.isSome(conflict)) {
					diagnostics.push(alwaysFalseStrategy(strategy, conflict.value));
				} else {
					strategies = HashSet.add(strategies, strategy);
				}
			})
			.with({ _tag: "BinaryDecision" }, (decision) => {
				const splits: ReadonlyArray<ConditionSplit> = decision.splits;
				const ordered = splits.flatMap((split) => branchesOf(split, conditions));
				pending.push(...ordered.reverse());
			})
			.exhaustive();
	}

	return { strategies, diagnostics };
}
