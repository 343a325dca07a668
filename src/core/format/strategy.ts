// CHANGE: Render strategies as `cond1 & cond2 : value` lines
// PURITY: CORE
// INVARIANT: serializeStrategies output depends only on the set of rendered lines,
//            never on set iteration order
// COMPLEXITY: O(n log n) for sorting where n = |strategies|

import type { Condition, Strategy } from "../models.js";

export const CONDITION_SEPARATOR = " & ";
export const VALUE_SEPARATOR = " : ";

/**
 * @pure true
 * @example renderCondition(device_type≠pc) → "device_type!=pc"
 */
export const renderCondition = (condition: Condition): string =>
	`${condition.feature}${condition.isEqual ? "=" : "!="}${condition.value}`;

/**
 * Shortest decimal that round-trips; integral values keep one decimal.
 *
 * @pure true
 * @example renderLeafValue(0.1) → "0.1"; renderLeafValue(1) → "1.0"
 */
export const renderLeafValue = (value: number): string =>
	Number.isInteger(value) ? value.toFixed(1) : String(value);

/**
 * @pure true
 * @example "device_type=pc & country!=argentina : 0.4"
 */
export const renderStrategy = (strategy: Strategy): string =>
	`${strategy.conditions.map(renderCondition).join(CONDITION_SEPARATOR)}${VALUE_SEPARATOR}${renderLeafValue(strategy.leaf.value)}`;

/**
 * Sorted, newline-terminated lines; the empty string for no strategies.
 *
 * @pure true
 * @invariant serializeStrategies(s) === serializeStrategies(permute(s))
 */
export function serializeStrategies(strategies: Iterable<Strategy>): string {
	const lines = Array.from(strategies, renderStrategy).sort();
	return lines.map((line) => `${line}\n`).join("");
}
