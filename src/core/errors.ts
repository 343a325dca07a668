// CHANGE: Typed error ADT for tree conversion using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A non-blank line matched neither the leaf nor the node grammar.
 *
 * @invariant line.length > 0
 */
export class UnparsableLine extends Data.TaggedError("UnparsableLine")<{
	readonly line: string;
	readonly reason: string;
}> {}

/**
 * The same node identifier was assigned on two lines.
 */
export class DuplicateIdentifier extends Data.TaggedError(
	"DuplicateIdentifier",
)<{
	readonly id: string;
}> {}

/**
 * Leaf value outside the closed interval [0, 1] (NaN included).
 */
export class InvalidLeafValue extends Data.TaggedError("InvalidLeafValue")<{
	readonly value: number;
}> {}

/**
 * A condition expression chains more than one `||or||`.
 *
 * @invariant operands > 2
 */
export class UnsupportedCombinator extends Data.TaggedError(
	"UnsupportedCombinator",
)<{
	readonly expression: string;
	readonly operands: number;
}> {}

/**
 * The tree has no decision point: empty input or a root that is a leaf.
 */
export class NodelessTree extends Data.TaggedError("NodelessTree")<{
	readonly detail: string;
}> {}

/**
 * A `yes`/`no` branch points to an identifier absent from the tree.
 */
export class DanglingReference extends Data.TaggedError("DanglingReference")<{
	readonly from: string;
	readonly target: string;
}> {}

/**
 * A node is reachable from itself.
 *
 * @invariant path[0] === path[path.length - 1]
 */
export class CyclicReference extends Data.TaggedError("CyclicReference")<{
	readonly path: ReadonlyArray<string>;
}> {}

/**
 * Filesystem operation error
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Configuration file missing (when named explicitly), malformed or mistyped.
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command line could not be turned into CLIOptions.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Errors raised while parsing the tree text.
 */
export type ParseError =
	| UnparsableLine
	| DuplicateIdentifier
	| InvalidLeafValue
	| UnsupportedCombinator
	| NodelessTree;

/**
 * Errors raised while building the binary condition-tree.
 */
export type NormalizeError = NodelessTree | DanglingReference | CyclicReference;

/**
 * Every way a single conversion call can terminate without output.
 */
export type ConversionError = ParseError | NormalizeError;

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError = ConversionError | FSError | ConfigError | UsageError;
