// CHANGE: Log conversion diagnostics through the Effect logger
// PURITY: SHELL
// EFFECT: Effect<void>
// INVARIANT: Diagnostics are logged at Debug level, in emission order
// COMPLEXITY: O(n) where n = |diagnostics|

import { Effect } from "effect";

import { formatDiagnostic } from "../../core/format/messages.js";
import type { Diagnostic } from "../../core/types/index.js";

/**
 * @effect Effect<void, never, never>
 */
export const logDiagnostics = (
	diagnostics: ReadonlyArray<Diagnostic>,
): Effect.Effect<void> =>
	Effect.forEach(
		diagnostics,
		(diagnostic) =>
			Effect.logDebug(formatDiagnostic(diagnostic)).pipe(
				Effect.annotateLogs("diagnostic", diagnostic._tag),
			),
		{ discard: true },
	);

/**
 * Number of strategies dropped as always false.
 *
 * @pure true
 */
export const countDiscarded = (diagnostics: ReadonlyArray<Diagnostic>): number =>
	diagnostics.filter((diagnostic) => diagnostic._tag === "AlwaysFalseStrategy")
		.length;
