// CHANGE: Read tree dumps and write strategy files
// PURITY: SHELL
// EFFECT: Effect<string | void, FSError>
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";

/**
 * Reads a tree dump as UTF-8 text.
 *
 * @pure false - reads the filesystem
 * @effect Effect<string, FSError>
 */
export const readTreeFile = (treeFile: string): Effect.Effect<string, FSError> =>
	Effect.try({
		try: () => fs.readFileSync(treeFile, "utf8"),
		catch: (error) =>
			new FSError({
				detail: `Cannot read tree file: ${String(error)}`,
				path: treeFile,
			}),
	});

/**
 * Writes (creates or overwrites) the strategies file.
 *
 * @pure false - writes the filesystem
 * @effect Effect<void, FSError>
 * @precondition content is the complete serialized output
 */
export const writeStrategiesFile = (
	strategiesFile: string,
	content: string,
): Effect.Effect<void, FSError> =>
	Effect.try({
		try: () => {
			fs.writeFileSync(strategiesFile, content, "utf8");
		},
		catch: (error) =>
			new FSError({
				detail: `Cannot write strategies file: ${String(error)}`,
				path: strategiesFile,
			}),
	});
