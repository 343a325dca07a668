// CHANGE: Configuration and CLI option types
// PURITY: CORE
// INVARIANT: Options are passed explicitly; no process-wide toggles
// COMPLEXITY: O(1) - type declarations only

import type { HashSet } from "effect";

import type { Strategy } from "../models.js";
import type { Diagnostic } from "./diagnostics.js";

/**
 * Options of a single conversion call.
 *
 * @property ignoreAlwaysFalseStrategies Drop strategies whose conditions contradict each other
 */
export interface ConversionOptions {
	readonly ignoreAlwaysFalseStrategies: boolean;
}

export const defaultConversionOptions: ConversionOptions = {
	ignoreAlwaysFalseStrategies: true,
};

/**
 * Result of a successful conversion.
 *
 * @property strategies Distinct strategies (structural equality)
 * @property diagnostics Parser diagnostics first, then enumeration diagnostics, in emission order
 */
export interface ConversionResult {
	readonly strategies: HashSet.HashSet<Strategy>;
	readonly diagnostics: ReadonlyArray<Diagnostic>;
}

/**
 * Contents of tree-strategies.config.json. Every key is optional.
 */
export interface ConverterConfig {
	readonly ignoreAlwaysFalseStrategies?: boolean;
}

/**
 * Parsed command line.
 *
 * @property treeFile Input tree dump
 * @property strategiesFile Output path, written only on success
 * @property ignoreAlwaysFalseStrategies Flag override; absent means "use config"
 * @property configPath Explicit configuration file
 * @property verbose Log debug diagnostics
 */
export interface CLIOptions {
	readonly treeFile: string;
	readonly strategiesFile: string;
	readonly ignoreAlwaysFalseStrategies?: boolean;
	readonly configPath?: string;
	readonly verbose: boolean;
}

/**
 * What the command line asks for: usage text or a conversion.
 */
export type CliCommand =
	| { readonly _tag: "Help" }
	| { readonly _tag: "Convert"; readonly options: CLIOptions };

/**
 * Exit code for the converter process.
 *
 * @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;
