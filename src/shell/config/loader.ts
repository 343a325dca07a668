// CHANGE: Load tree-strategies.config.json
// PURITY: SHELL (filesystem read)
// EFFECT: Effect<ConverterConfig, ConfigError>
// INVARIANT: Missing default file ⇒ {}; missing explicit file, bad JSON or mistyped key ⇒ ConfigError
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { ConverterConfig } from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "tree-strategies.config.json";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

/**
 * Type guard to check if value is a JSON object.
 */
function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Validates the parsed file; unknown keys are ignored.
 *
 * @pure true
 */
function validateConfig(
	value: JSONValue,
	configPath: string,
): Effect.Effect<ConverterConfig, ConfigError> {
	if (!isJSONObject(value)) {
		return Effect.fail(
			new ConfigError({ path: configPath, detail: "expected a JSON object" }),
		);
	}

	const flag = value["ignoreAlwaysFalseStrategies"];
	if (flag === undefined) {
		return Effect.succeed({});
	}
	if (typeof flag !== "boolean") {
		return Effect.fail(
			new ConfigError({
				path: configPath,
				detail: '"ignoreAlwaysFalseStrategies" must be a boolean',
			}),
		);
	}
	return Effect.succeed({ ignoreAlwaysFalseStrategies: flag });
}

const readConfigText = (
	configPath: string,
): Effect.Effect<string, ConfigError> =>
	Effect.try({
		try: () => fs.readFileSync(configPath, "utf8"),
		catch: (error) =>
			new ConfigError({ path: configPath, detail: `cannot read: ${String(error)}` }),
	});

const parseConfigText = (
	raw: string,
	configPath: string,
): Effect.Effect<JSONValue, ConfigError> =>
	Effect.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: (error) =>
			new ConfigError({ path: configPath, detail: `invalid JSON: ${String(error)}` }),
	});

/**
 * Loads converter configuration.
 *
 * @param configPath Explicit file (relative to cwd); when absent the default
 *   file in cwd is used if it exists
 * @param cwd Directory used to resolve paths
 *
 * @pure false - reads the filesystem
 * @effect Effect<ConverterConfig, ConfigError>
 *
 * @example
 * ```ts
 * // tree-strategies.config.json: { "ignoreAlwaysFalseStrategies": false }
 * Effect.runSync(loadConverterConfig()); // { ignoreAlwaysFalseStrategies: false }
 * ```
 */
export function loadConverterConfig(
	configPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<ConverterConfig, ConfigError> {
	const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

	return Effect.gen(function* () {
		if (configPath === undefined && !fs.existsSync(resolved)) {
			yield* Effect.logDebug(`No ${DEFAULT_CONFIG_FILE} in ${cwd}, using defaults`);
			return {};
		}

		const raw = yield* readConfigText(resolved);
		const parsed = yield* parseConfigText(raw, resolved);
		return yield* validateConfig(parsed, resolved);
	});
}
