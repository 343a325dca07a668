// CHANGE: Thin APP delegator: parse CLI, then help or conversion
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";
import { match } from "ts-pattern";

import { runConversionEffect } from "./app/runConversion.js";
import type { UsageError } from "./core/errors.js";
import { formatAppError } from "./core/format/messages.js";
import type { CliCommand, ExitCode } from "./core/types/index.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";

/**
 * Entry for command line usage (without terminating process).
 *
 * @param args Arguments without the node and script entries
 * @returns ExitCode (0 | 1); 1 for usage errors and failed conversions
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Promise<ExitCode> {
	const program = parseCLIArgs(args).pipe(
		Effect.flatMap((command) =>
			match<CliCommand, Effect.Effect<ExitCode, UsageError>>(command)
				.with({ _tag: "Help" }, () =>
					Effect.sync((): ExitCode => {
						console.log(USAGE);
						return 0;
					}),
				)
				.with({ _tag: "Convert" }, ({ options }) => runConversionEffect(options))
				.exhaustive(),
		),
		Effect.catchTag("UsageError", (error) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ ${formatAppError(error)}`);
				console.error(USAGE);
				return 1;
			}),
		),
	);
	return Effect.runPromise(program);
}
