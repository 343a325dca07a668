// CHANGE: Parse condition expressions of node lines
// PURITY: CORE
// INVARIANT: "!=" takes precedence over "="; at most one "||or||" per expression
// COMPLEXITY: O(n) where n = |expression|

import { Effect } from "effect";

import { UnparsableLine, UnsupportedCombinator } from "../errors.js";
import { Condition, type EligibleConditions } from "../models.js";

export const OR_COMBINATOR = "||or||";

const TOKEN_PATTERN = /^[^\s=,|\[\]]+$/u;

const isToken = (candidate: string): boolean => TOKEN_PATTERN.test(candidate);

/**
 * Parses `feature=value` or `feature!=value`.
 *
 * @param expression Condition text without brackets
 * @param line Raw line, reported on failure
 *
 * @pure true
 * @effect Effect<Condition, UnparsableLine>
 * @invariant result.feature and result.value are tokens (no whitespace, "=", ",", "|", brackets)
 *
 * @example
 * ```ts
 * parseCondition("device_type!=pc", line);
 * // Condition { feature: "device_type", value: "pc", isEqual: false }
 * ```
 */
export function parseCondition(
	expression: string,
	line: string,
): Effect.Effect<Condition, UnparsableLine> {
	const operator = expression.includes("!=") ? "!=" : "=";
	const parts = expression.split(operator);
	const [feature = "", value = ""] = parts;

	if (parts.length !== 2) {
		return Effect.fail(
			new UnparsableLine({
				line,
				reason: `expected exactly one "${operator}" in condition "${expression}"`,
			}),
		);
	}
	if (!isToken(feature) || !isToken(value)) {
		return Effect.fail(
			new UnparsableLine({
				line,
				reason: `condition "${expression}" needs a non-empty feature and value`,
			}),
		);
	}

	return Effect.succeed(
		new Condition({ feature, value, isEqual: operator === "=" }),
	);
}

/**
 * Parses the bracketed part of a node line into one condition or an OR pair.
 *
 * @pure true
 * @effect Effect<EligibleConditions, UnparsableLine | UnsupportedCombinator>
 *
 * @example
 * ```ts
 * parseConditionExpression("device_type=pc||or||support=mobile", line);
 * // [Condition(device_type=pc), Condition(support=mobile)]
 * parseConditionExpression("a=1||or||b=2||or||c=3", line);
 * // fails with UnsupportedCombinator { operands: 3 }
 * ```
 */
export function parseConditionExpression(
	expression: string,
	line: string,
): Effect.Effect<EligibleConditions, UnparsableLine | UnsupportedCombinator> {
	const operands = expression.split(OR_COMBINATOR);

	return Effect.gen(function* () {
		if (operands.length > 2) {
			return yield* Effect.fail(
				new UnsupportedCombinator({ expression, operands: operands.length }),
			);
		}

		const [first = "", second] = operands;
		const condition = yield* parseCondition(first, line);
		if (second === undefined) {
			return [condition] as const;
		}

		const alternative = yield* parseCondition(second, line);
		return [condition, alternative] as const;
	});
}
