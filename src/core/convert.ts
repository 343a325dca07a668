// CHANGE: Single entry point of the conversion pipeline
// PURITY: CORE
// EFFECT: Effect<ConversionResult, ConversionError>
// INVARIANT: Same text and options ⇒ same strategies, same diagnostics, same serialized output
// COMPLEXITY: O(n + p · d) where n = |text|, p = paths, d = depth

import { Effect, pipe } from "effect";

import { enumerateStrategies } from "./enumerator.js";
import type { ConversionError } from "./errors.js";
import { serializeStrategies } from "./format/strategy.js";
import { toBinaryTree } from "./normalizer.js";
import { parseTree } from "./parser/tree.js";
import {
	type ConversionOptions,
	type ConversionResult,
	defaultConversionOptions,
} from "./types/config.js";

/**
 * Parses a tree dump, removes OR conditions and lists one strategy per path.
 *
 * @param text Tree dump, one entry per line
 * @param options Conversion options (always-false strategies ignored by default)
 *
 * @pure true
 * @effect Effect<ConversionResult, ConversionError>
 *
 * @example
 * ```ts
 * const result = Effect.runSync(convertTreeToStrategies([
 *   "0:[device_type=pc||or||support=mobile] yes=1,no=2",
 *   "1:leaf=0.1",
 *   "2:leaf=0.2",
 * ].join("\n")));
 * HashSet.size(result.strategies); // 3
 * ```
 */
export function convertTreeToStrategies(
	text: string,
	options: ConversionOptions = defaultConversionOptions,
): Effect.Effect<ConversionResult, ConversionError> {
	return Effect.gen(function* () {
		const parsed = yield* parseTree(text);
		const binaryTree = yield* toBinaryTree(parsed.tree);
		const enumerated = enumerateStrategies(binaryTree, options);
		return {
			strategies: enumerated.strategies,
			diagnostics: [...parsed.diagnostics, ...enumerated.diagnostics],
		};
	});
}

/**
 * Conversion followed by serialization to the sorted text format.
 *
 * @pure true
 * @effect Effect<string, ConversionError>
 */
export const convertTreeToText = (
	text: string,
	options: ConversionOptions = defaultConversionOptions,
): Effect.Effect<string, ConversionError> =>
	pipe(
		convertTreeToStrategies(text, options),
		Effect.map((result) => serializeStrategies(result.strategies)),
	);
