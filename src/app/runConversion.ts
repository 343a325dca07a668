// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// PURITY: APP (no process.exit; console output only at the end of the program)
// EFFECT: Effect<ExitCode>
// INVARIANT: The strategies file is written only after the whole conversion succeeded
// COMPLEXITY: O(n + p · d) (see core/convert)

import { Effect, HashSet, Logger, LogLevel } from "effect";

import { convertTreeToStrategies } from "../core/convert.js";
import type { AppError } from "../core/errors.js";
import { formatAppError } from "../core/format/messages.js";
import { serializeStrategies } from "../core/format/strategy.js";
import { resolveConversionOptions } from "../core/options.js";
import type { CLIOptions, ExitCode } from "../core/types/index.js";
import { loadConverterConfig } from "../shell/config/index.js";
import { readTreeFile, writeStrategiesFile } from "../shell/fs/files.js";
import { countDiscarded, logDiagnostics } from "../shell/output/diagnostics.js";

/**
 * Outcome of a successful file conversion.
 */
export interface ConversionSummary {
	readonly strategiesFile: string;
	readonly written: number;
	readonly discarded: number;
}

/**
 * Config → read → convert → log diagnostics → write.
 *
 * @param options Parsed command line
 * @param cwd Directory holding the default configuration file
 *
 * @pure false - filesystem access
 * @effect Effect<ConversionSummary, AppError>
 */
export function convertFile(
	options: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ConversionSummary, AppError> {
	return Effect.gen(function* () {
		const config = yield* loadConverterConfig(options.configPath, cwd);
		const conversionOptions = resolveConversionOptions(options, config);
		yield* Effect.logDebug(
			`Converting ${options.treeFile} (ignoreAlwaysFalseStrategies=${conversionOptions.ignoreAlwaysFalseStrategies})`,
		);

		const text = yield* readTreeFile(options.treeFile);
		const result = yield* convertTreeToStrategies(text, conversionOptions);
		yield* logDiagnostics(result.diagnostics);

		yield* writeStrategiesFile(
			options.strategiesFile,
			serializeStrategies(result.strategies),
		);

		return {
			strategiesFile: options.strategiesFile,
			written: HashSet.size(result.strategies),
			discarded: countDiscarded(result.diagnostics),
		};
	});
}

/**
 * Runs a conversion and reports its outcome on the console.
 *
 * @effect Effect<ExitCode, never, never>
 * @invariant ExitCode ∈ {0,1}; 0 iff the strategies file was written
 */
export function runConversionEffect(
	options: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode> {
	return convertFile(options, cwd).pipe(
		Effect.map((summary): ExitCode => {
			const discardedText =
				summary.discarded > 0
					? ` (${summary.discarded} always-false discarded)`
					: "";
			console.log(
				`✅ Wrote ${summary.written} strategies to ${summary.strategiesFile}${discardedText}`,
			);
			return 0;
		}),
		Effect.catchAll((error: AppError) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ ${formatAppError(error)}`);
				return 1;
			}),
		),
		Logger.withMinimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Info),
	);
}

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @example
 * ```ts
 * const exitCode = await runConversion({
 *   treeFile: "model/tree.txt",
 *   strategiesFile: "model/strategies.txt",
 *   verbose: false,
 * });
 * ```
 */
export const runConversion = (
	options: CLIOptions,
	cwd: string = process.cwd(),
): Promise<ExitCode> => Effect.runPromise(runConversionEffect(options, cwd));
