// CHANGE: Command line parsing for tree-to-strategies
// PURITY: SHELL (reads process.argv by default)
// EFFECT: Effect<CliCommand, UsageError>
// INVARIANT: Exactly two positionals (tree file, strategies file) unless --help
// COMPLEXITY: O(n) where n = |args|

import { Effect } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CliCommand, CLIOptions } from "../../core/types/index.js";

export const USAGE = [
	"Usage: tree-to-strategies <tree-file> <strategies-file> [options]",
	"",
	"Options:",
	"  --ignore-always-false   Drop strategies whose conditions contradict (default)",
	"  --keep-always-false     Keep strategies whose conditions contradict",
	"  --config <path>         Configuration file (default: tree-strategies.config.json)",
	"  -v, --verbose           Log debug diagnostics",
	"  -h, --help              Show this help",
].join("\n");

interface ArgState {
	readonly positionals: ReadonlyArray<string>;
	readonly ignoreAlwaysFalseStrategies: boolean | undefined;
	readonly configPath: string | undefined;
	readonly verbose: boolean;
	readonly help: boolean;
}

interface ArgStep {
	readonly state: ArgState;
	readonly skipNext: boolean;
}

type FlagHandler = (
	state: ArgState,
	next: string | undefined,
) => Effect.Effect<ArgStep, UsageError>;

const booleanFlag =
	(update: (state: ArgState) => ArgState): FlagHandler =>
	(state) =>
		Effect.succeed({ state: update(state), skipNext: false });

const configFlag: FlagHandler = (state, next) =>
	next === undefined || next.startsWith("-")
		? Effect.fail(new UsageError({ detail: "--config requires a path" }))
		: Effect.succeed({ state: { ...state, configPath: next }, skipNext: true });

const verboseFlag = booleanFlag((state) => ({ ...state, verbose: true }));
const helpFlag = booleanFlag((state) => ({ ...state, help: true }));

const flagHandlers: Readonly<Record<string, FlagHandler | undefined>> = {
	"--ignore-always-false": booleanFlag((state) => ({
		...state,
		ignoreAlwaysFalseStrategies: true,
	})),
	"--keep-always-false": booleanFlag((state) => ({
		...state,
		ignoreAlwaysFalseStrategies: false,
	})),
	"--config": configFlag,
	"--verbose": verboseFlag,
	"-v": verboseFlag,
	"--help": helpFlag,
	"-h": helpFlag,
};

function processArgument(
	arg: string,
	next: string | undefined,
	state: ArgState,
): Effect.Effect<ArgStep, UsageError> {
	const handler = flagHandlers[arg];
	if (handler !== undefined) {
		return handler(state, next);
	}
	if (arg.startsWith("-") && arg.length > 1) {
		return Effect.fail(new UsageError({ detail: `Unknown option "${arg}"` }));
	}
	return Effect.succeed({
		state: { ...state, positionals: [...state.positionals, arg] },
		skipNext: false,
	});
}

function toCommand(state: ArgState): Effect.Effect<CliCommand, UsageError> {
	if (state.help) {
		return Effect.succeed<CliCommand>({ _tag: "Help" });
	}

	const [treeFile, strategiesFile, ...extra] = state.positionals;
	if (treeFile === undefined || strategiesFile === undefined) {
		return Effect.fail(
			new UsageError({
				detail: "Expected a tree file and a strategies file",
			}),
		);
	}
	if (extra.length > 0) {
		return Effect.fail(
			new UsageError({ detail: `Unexpected argument "${extra.join(" ")}"` }),
		);
	}

	// exactOptionalPropertyTypes: absent keys model "not given"
	const base: CLIOptions = { treeFile, strategiesFile, verbose: state.verbose };
	const withFlag: CLIOptions =
		state.ignoreAlwaysFalseStrategies === undefined
			? base
			: { ...base, ignoreAlwaysFalseStrategies: state.ignoreAlwaysFalseStrategies };
	const options: CLIOptions =
		state.configPath === undefined
			? withFlag
			: { ...withFlag, configPath: state.configPath };
	return Effect.succeed<CliCommand>({ _tag: "Convert", options });
}

/**
 * Parses command line arguments.
 *
 * @param args Arguments without the node and script entries
 *
 * @effect Effect<CliCommand, UsageError>
 *
 * @example
 * ```ts
 * // Command: tree-to-strategies tree.txt strategies.txt --keep-always-false
 * Effect.runSync(parseCLIArgs());
 * // { _tag: "Convert", options: { treeFile: "tree.txt", strategiesFile: "strategies.txt",
 * //   ignoreAlwaysFalseStrategies: false, verbose: false } }
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<CliCommand, UsageError> {
	return Effect.gen(function* () {
		let state: ArgState = {
			positionals: [],
			ignoreAlwaysFalseStrategies: undefined,
			configPath: undefined,
			verbose: false,
			help: false,
		};

		for (let i = 0; i < args.length; i++) {
			const arg = args.at(i) ?? "";
			if (arg.length === 0) continue;

			const step = yield* processArgument(arg, args.at(i + 1), state);
			state = step.state;
			if (step.skipNext) {
				i++;
			}
		}

		return yield* toCommand(state);
	});
}
