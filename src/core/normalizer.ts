// CHANGE: Rewrite the identifier-indexed tree into an OR-free binary condition-tree
// PURITY: CORE
// INVARIANT: ¬(A ∨ B) ≡ ¬A ∧ ¬B; an OR node reaches `no` only through ¬A ∧ ¬B,
//            and reaches `yes` through A alone or through B alone
// COMPLEXITY: O(p) where p = number of root-to-leaf paths of the expanded tree

import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	CyclicReference,
	DanglingReference,
	type NormalizeError,
	NodelessTree,
} from "./errors.js";
import type { DecisionNode, TreeEntry } from "./models.js";
import {
	type BinaryBranch,
	type BinaryDecision,
	type ConditionSplit,
	type ParsedTree,
	redundantPath,
} from "./types/tree.js";

const decision = (splits: BinaryDecision["splits"]): BinaryDecision => ({
	_tag: "BinaryDecision",
	splits,
});

/**
 * Splits for one decision node, given its already normalized branches.
 *
 * A ∨ B becomes two sibling splits:
 * - A: true → yes; false → (B: true → redundant, false → no)
 * - B: true → yes; false → redundant
 *
 * @pure true
 */
function splitsOf(
	node: DecisionNode,
	yes: BinaryBranch,
	no: BinaryBranch,
): BinaryDecision["splits"] {
	const { conditions } = node;
	if (conditions.length === 1) {
		const [condition] = conditions;
		return [{ condition, whenTrue: yes, whenFalse: no }];
	}

	const [first, second] = conditions;
	const bothFalse: ConditionSplit = {
		condition: second,
		whenTrue: redundantPath,
		whenFalse: no,
	};
	return [
		{ condition: first, whenTrue: yes, whenFalse: decision([bothFalse]) },
		{ condition: second, whenTrue: yes, whenFalse: redundantPath },
	];
}

function normalizeNode(
	tree: ParsedTree,
	id: string,
	node: DecisionNode,
	path: ReadonlyArray<string>,
): Effect.Effect<BinaryDecision, NormalizeError> {
	return Effect.gen(function* () {
		const yes = yield* normalizeReference(tree, id, node.yes, path);
		const no = yield* normalizeReference(tree, id, node.no, path);
		return decision(splitsOf(node, yes, no));
	});
}

/**
 * Resolves `target` (referenced by node `from`) and normalizes it.
 *
 * @param path Identifiers from the root down to `from`, used to detect cycles
 */
function normalizeReference(
	tree: ParsedTree,
	from: string,
	target: string,
	path: ReadonlyArray<string>,
): Effect.Effect<BinaryBranch, NormalizeError> {
	const entry = tree.entries.get(target);
	if (entry === undefined) {
		return Effect.fail(new DanglingReference({ from, target }));
	}
	if (path.includes(target)) {
		return Effect.fail(new CyclicReference({ path: [...path, target] }));
	}

	return match<TreeEntry, Effect.Effect<BinaryBranch, NormalizeError>>(entry)
		.with({ _tag: "Leaf" }, (leaf) => Effect.succeed(leaf))
		.with({ _tag: "DecisionNode" }, (node) =>
			normalizeNode(tree, target, node, [...path, target]),
		)
		.exhaustive();
}

/**
 * Converts a parsed tree into a binary condition-tree, starting at its root.
 *
 * @param tree Parser output
 * @returns Root decision of the binary condition-tree
 *
 * @pure true
 * @effect Effect<BinaryDecision, NodelessTree | DanglingReference | CyclicReference>
 * @precondition tree.entries.has(tree.rootId)
 *
 * @example
 * ```ts
 * // 0:[device_type=pc||or||support=mobile] yes=1,no=2
 * // → splits[0]: device_type=pc  (true → leaf 1, false → support=mobile: true → redundant, false → leaf 2)
 * //   splits[1]: support=mobile  (true → leaf 1, false → redundant)
 * ```
 */
export function toBinaryTree(
	tree: ParsedTree,
): Effect.Effect<BinaryDecision, NormalizeError> {
	const root = tree.entries.get(tree.rootId);
	if (root === undefined) {
		return Effect.fail(
			new NodelessTree({ detail: `root "${tree.rootId}" has no entry` }),
		);
	}

	return match<TreeEntry, Effect.Effect<BinaryDecision, NormalizeError>>(root)
		.with({ _tag: "Leaf" }, () =>
			Effect.fail(
				new NodelessTree({
					detail: `root "${tree.rootId}" is a leaf; expected at least one node`,
				}),
			),
		)
		.with({ _tag: "DecisionNode" }, (node) =>
			normalizeNode(tree, tree.rootId, node, [tree.rootId]),
		)
		.exhaustive();
}
