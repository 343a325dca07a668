// CHANGE: Detect strategies whose conjunction of conditions can never hold
// PURITY: CORE
// INVARIANT: Only (x=a ∧ x=b, a≠b) and (x=a ∧ x≠a) contradict; x≠a ∧ x≠b never does
// COMPLEXITY: O(n + Σ k²) where n = |conditions|, k = conditions sharing a feature

import { Option } from "effect";

import type { Condition, Strategy } from "./models.js";

/**
 * Whether two conditions on the same feature cannot hold together.
 *
 * @pure true
 * @precondition left.feature === right.feature
 */
export const contradicts = (left: Condition, right: Condition): boolean =>
	left.isEqual && right.isEqual
		? left.value !== right.value
		: left.isEqual !== right.isEqual && left.value === right.value;

const groupByFeature = (
	conditions: ReadonlyArray<Condition>,
): ReadonlyArray<ReadonlyArray<Condition>> => {
	const groups = new Map<string, Condition[]>();
	for (const condition of conditions) {
		const group = groups.get(condition.feature);
		if (group === undefined) {
			groups.set(condition.feature, [condition]);
		} else {
			group.push(condition);
		}
	}
	return [...groups.values()];
};

/**
 * First pair of conditions that contradict each other, in traversal order.
 *
 * @pure true
 * @returns Option.some([earlier, later]) or Option.none() when the conjunction is satisfiable
 *
 * @example
 * ```ts
 * findContradiction([eq("device_type", "pc"), eq("device_type", "mobile")]);
 * // Option.some([device_type=pc, device_type=mobile])
 * findContradiction([neq("device_type", "pc"), neq("device_type", "gameboy")]);
 * // Option.none()
 * ```
 */
export function findContradiction(
	conditions: ReadonlyArray<Condition>,
): Option.Option<readonly [Condition, Condition]> {
	for (const group of groupByFeature(conditions)) {
		for (const [index, left] of group.entries()) {
			const right = group.slice(index + 1).find((other) => contradicts(left, other));
			if (right !== undefined) {
				return Option.some([left, right] as const);
			}
		}
	}
	return Option.none();
}

/**
 * @pure true
 * @returns true when some assignment of feature values satisfies every condition
 */
export const isSatisfiable = (strategy: Strategy): boolean =>
	Option.isNone(findContradiction(strategy.conditions));
