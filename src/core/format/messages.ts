// CHANGE: Human-readable messages for errors and diagnostics
// PURITY: CORE
// INVARIANT: Every error and diagnostic tag has exactly one message (exhaustive match)
// COMPLEXITY: O(n) where n = size of the payload

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import type { Diagnostic } from "../types/diagnostics.js";
import { renderCondition, renderStrategy } from "./strategy.js";

/**
 * One-line description of a terminal error.
 *
 * @pure true
 * @example formatAppError(new DuplicateIdentifier({ id: "3" })) → 'Duplicate node identifier "3"'
 */
export const formatAppError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "UnparsableLine" },
			(e) => `Cannot parse line "${e.line}": ${e.reason}`,
		)
		.with(
			{ _tag: "DuplicateIdentifier" },
			(e) => `Duplicate node identifier "${e.id}"`,
		)
		.with(
			{ _tag: "InvalidLeafValue" },
			(e) => `Invalid leaf value ${e.value}, must be in [0, 1]`,
		)
		.with(
			{ _tag: "UnsupportedCombinator" },
			(e) =>
				`Unsupported condition "${e.expression}": ${e.operands} operands, at most one "||or||" is allowed`,
		)
		.with({ _tag: "NodelessTree" }, (e) => `Tree has no node: ${e.detail}`)
		.with(
			{ _tag: "DanglingReference" },
			(e) => `Node "${e.from}" references unknown node "${e.target}"`,
		)
		.with(
			{ _tag: "CyclicReference" },
			(e) => `Cyclic reference: ${e.path.join(" -> ")}`,
		)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? e.detail : `${e.detail} (${e.path})`,
		)
		.with(
			{ _tag: "ConfigError" },
			(e) => `Invalid configuration ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.exhaustive();

/**
 * Debug log line for a diagnostic.
 *
 * @pure true
 * @example formatDiagnostic(blankLineSkipped(2)) → "Skipping empty line: 2"
 */
export const formatDiagnostic = (diagnostic: Diagnostic): string =>
	match(diagnostic)
		.with(
			{ _tag: "BlankLineSkipped" },
			(d) => `Skipping empty line: ${d.lineIndex}`,
		)
		.with(
			{ _tag: "AlwaysFalseStrategy" },
			(d) =>
				`Always false strategy: ${renderStrategy(d.strategy)} for ${renderCondition(d.conflict[0])} and ${renderCondition(d.conflict[1])}`,
		)
		.exhaustive();
