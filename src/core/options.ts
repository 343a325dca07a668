// CHANGE: Merge CLI flags, config file and defaults into ConversionOptions
// PURITY: CORE
// INVARIANT: CLI flag ≻ config file ≻ default
// COMPLEXITY: O(1)

import type {
	CLIOptions,
	ConversionOptions,
	ConverterConfig,
} from "./types/config.js";
import { defaultConversionOptions } from "./types/config.js";

/**
 * @pure true
 * @example
 * ```ts
 * resolveConversionOptions({}, { ignoreAlwaysFalseStrategies: false });
 * // { ignoreAlwaysFalseStrategies: false }
 * resolveConversionOptions({ ignoreAlwaysFalseStrategies: true }, { ignoreAlwaysFalseStrategies: false });
 * // { ignoreAlwaysFalseStrategies: true }
 * ```
 */
export const resolveConversionOptions = (
	cli: Pick<CLIOptions, "ignoreAlwaysFalseStrategies">,
	config: ConverterConfig,
): ConversionOptions => ({
	ignoreAlwaysFalseStrategies:
		cli.ignoreAlwaysFalseStrategies ??
		config.ignoreAlwaysFalseStrategies ??
		defaultConversionOptions.ignoreAlwaysFalseStrategies,
});
