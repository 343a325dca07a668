// CHANGE: Central export file for all type definitions
// PURITY: CORE (re-exports only)

export type {
	CliCommand,
	CLIOptions,
	ConversionOptions,
	ConversionResult,
	ConverterConfig,
	ExitCode,
} from "./config.js";
export { defaultConversionOptions } from "./config.js";
export type {
	AlwaysFalseStrategy,
	BlankLineSkipped,
	Diagnostic,
} from "./diagnostics.js";
export { alwaysFalseStrategy, blankLineSkipped } from "./diagnostics.js";
export type {
	BinaryBranch,
	BinaryDecision,
	ConditionSplit,
	ParsedTree,
	RedundantPath,
} from "./tree.js";
export { redundantPath } from "./tree.js";
