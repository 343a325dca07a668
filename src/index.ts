// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed values or the APP orchestrator

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * File-to-file conversion.
 *
 * @example
 * ```typescript
 * import { runConversion } from "tree-strategies";
 *
 * const exitCode = await runConversion({
 *   treeFile: "tree.txt",
 *   strategiesFile: "strategies.txt",
 *   ignoreAlwaysFalseStrategies: true,
 *   verbose: false,
 * });
 * ```
 */
export {
	type ConversionSummary,
	convertFile,
	runConversion,
	runConversionEffect,
} from "./app/runConversion.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure conversion pipeline)
// ═══════════════════════════════════════════════════════════════════════════════

export { convertTreeToStrategies, convertTreeToText } from "./core/convert.js";
export { parseTree, type ParseOutcome } from "./core/parser/tree.js";
export { parseLine } from "./core/parser/line.js";
export {
	parseCondition,
	parseConditionExpression,
} from "./core/parser/condition.js";
export { toBinaryTree } from "./core/normalizer.js";
export {
	type EnumerationOutcome,
	enumerateStrategies,
} from "./core/enumerator.js";
export {
	contradicts,
	findContradiction,
	isSatisfiable,
} from "./core/contradiction.js";
export {
	renderCondition,
	renderLeafValue,
	renderStrategy,
	serializeStrategies,
} from "./core/format/strategy.js";
export { formatAppError, formatDiagnostic } from "./core/format/messages.js";
export { resolveConversionOptions } from "./core/options.js";

// ═══════════════════════════════════════════════════════════════════════════════
// DOMAIN MODELS AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	Condition,
	DecisionNode,
	type EligibleConditions,
	Leaf,
	makeLeaf,
	negateCondition,
	Strategy,
	type TreeEntry,
} from "./core/models.js";
export {
	type AppError,
	ConfigError,
	type ConversionError,
	CyclicReference,
	DanglingReference,
	DuplicateIdentifier,
	FSError,
	InvalidLeafValue,
	NodelessTree,
	UnparsableLine,
	UnsupportedCombinator,
	UsageError,
} from "./core/errors.js";
export * from "./core/types/index.js";
