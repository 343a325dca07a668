// CHANGE: Immutable domain models for decision trees and strategies
// PURITY: CORE
// INVARIANT: Values never mutate after construction; equality and hashing are structural
// COMPLEXITY: O(1) per construction, O(n) for Strategy where n = |conditions|

import { Data, Effect } from "effect";

import { InvalidLeafValue } from "./errors.js";

/**
 * Single feature test: `feature=value` when isEqual, `feature!=value` otherwise.
 *
 * @remarks
 * Structural equality (Effect `Equal`) makes conditions usable as HashSet/HashMap keys.
 *
 * @invariant feature.length > 0 ∧ value.length > 0
 */
export class Condition extends Data.TaggedClass("Condition")<{
	readonly feature: string;
	readonly value: string;
	readonly isEqual: boolean;
}> {}

/**
 * Returns the complementary test on the same feature/value pair.
 *
 * @pure true
 * @invariant negateCondition(negateCondition(c)) ≡ c
 */
export const negateCondition = (condition: Condition): Condition =>
	new Condition({
		feature: condition.feature,
		value: condition.value,
		isEqual: !condition.isEqual,
	});

/**
 * @pure true
 * @returns true iff 0 <= value <= 1 (false for NaN)
 */
export const isLeafValue = (value: number): boolean => value >= 0 && value <= 1;

/**
 * Terminal value of a tree.
 *
 * The constructor throws InvalidLeafValue for values outside [0, 1]; use
 * {@link makeLeaf} to get the failure as a typed Effect instead.
 *
 * @invariant 0 <= value <= 1
 */
export class Leaf extends Data.TaggedClass("Leaf")<{
	readonly value: number;
}> {
	constructor(args: { readonly value: number }) {
		if (!isLeafValue(args.value)) {
			throw new InvalidLeafValue({ value: args.value });
		}
		super(args);
	}
}

/**
 * Validating leaf constructor.
 *
 * @pure true
 * @effect Effect<Leaf, InvalidLeafValue>
 *
 * @example
 * ```ts
 * Effect.runSync(makeLeaf(0.5)); // Leaf { value: 0.5 }
 * Effect.runSync(Effect.flip(makeLeaf(1.5))); // InvalidLeafValue { value: 1.5 }
 * ```
 */
export const makeLeaf = (value: number): Effect.Effect<Leaf, InvalidLeafValue> =>
	isLeafValue(value)
		? Effect.succeed(new Leaf({ value }))
		: Effect.fail(new InvalidLeafValue({ value }));

/**
 * One condition (plain test) or two (`A||or||B`). Longer chains are
 * unrepresentable and rejected by the parser.
 */
export type EligibleConditions =
	| readonly [Condition]
	| readonly [Condition, Condition];

/**
 * Decision point of the raw tree; `yes`/`no` are identifiers of other entries.
 */
export class DecisionNode extends Data.TaggedClass("DecisionNode")<{
	readonly conditions: EligibleConditions;
	readonly yes: string;
	readonly no: string;
}> {}

/**
 * Entry of the parsed tree, keyed by its identifier.
 */
export type TreeEntry = Leaf | DecisionNode;

/**
 * One root-to-leaf path: the conjunction of conditions and the value reached.
 *
 * @remarks
 * Conditions are stored as an Effect `Data.array`, so two strategies with the
 * same ordered conditions and bit-identical leaf values are `Equal` and hash alike.
 */
export class Strategy extends Data.TaggedClass("Strategy")<{
	readonly conditions: ReadonlyArray<Condition>;
	readonly leaf: Leaf;
}> {
	constructor(args: {
		readonly conditions: ReadonlyArray<Condition>;
		readonly leaf: Leaf;
	}) {
		super({ conditions: Data.array([...args.conditions]), leaf: args.leaf });
	}
}
