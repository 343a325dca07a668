// CHANGE: Specs for the OR-free binary condition-tree
// PURITY: CORE
// INVARIANT: A||or||B reaches `no` only through ¬A ∧ ¬B; references resolve or fail

import { Effect, Equal } from "effect";
import { describe, expect, it } from "vitest";

import { Leaf } from "../../src/core/models.js";
import { toBinaryTree } from "../../src/core/normalizer.js";
import { parseTree } from "../../src/core/parser/tree.js";
import type { BinaryBranch, BinaryDecision } from "../../src/core/types/index.js";
import { eq, treeText } from "../utils/builders.js";

const normalize = (...lines: ReadonlyArray<string>): BinaryDecision =>
	Effect.runSync(
		parseTree(treeText(...lines)).pipe(
			Effect.flatMap((outcome) => toBinaryTree(outcome.tree)),
		),
	);

const normalizeError = (...lines: ReadonlyArray<string>) =>
	Effect.runSync(
		Effect.flip(
			parseTree(treeText(...lines)).pipe(
				Effect.flatMap((outcome) => toBinaryTree(outcome.tree)),
			),
		),
	);

const leafValue = (branch: BinaryBranch): number | undefined =>
	branch._tag === "Leaf" ? branch.value : undefined;

describe("toBinaryTree", () => {
	it("keeps a plain node as one split", () => {
		const root = normalize("0:[os=linux] yes=1,no=2", "1:leaf=0.1", "2:leaf=0.2");
		expect(root.splits).toHaveLength(1);
		const [split] = root.splits;
		expect(Equal.equals(split.condition, eq("os", "linux"))).toBe(true);
		expect(leafValue(split.whenTrue)).toBe(0.1);
		expect(leafValue(split.whenFalse)).toBe(0.2);
	});

	it("rewrites an OR node into two sibling splits", () => {
		const root = normalize(
			"0:[device_type=pc||or||support=mobile] yes=1,no=2",
			"1:leaf=0.1",
			"2:leaf=0.2",
		);
		expect(root.splits).toHaveLength(2);
		const [first, second] = root.splits;
		expect(Equal.equals(first.condition, eq("device_type", "pc"))).toBe(true);
		expect(leafValue(first.whenTrue)).toBe(0.1);

		const inner = first.whenFalse;
		expect(inner._tag).toBe("BinaryDecision");
		if (inner._tag === "BinaryDecision") {
			expect(inner.splits).toHaveLength(1);
			const [bothFalse] = inner.splits;
			expect(Equal.equals(bothFalse.condition, eq("support", "mobile"))).toBe(true);
			expect(bothFalse.whenTrue._tag).toBe("RedundantPath");
			expect(leafValue(bothFalse.whenFalse)).toBe(0.2);
		}

		expect(second).toBeDefined();
		if (second !== undefined) {
			expect(Equal.equals(second.condition, eq("support", "mobile"))).toBe(true);
			expect(leafValue(second.whenTrue)).toBe(0.1);
			expect(second.whenFalse._tag).toBe("RedundantPath");
		}
	});

	it("shares a leaf referenced from two nodes", () => {
		const root = normalize(
			"0:[os=linux] yes=1,no=2",
			"1:[country=fr] yes=3,no=3",
			"2:leaf=0.2",
			"3:leaf=0.3",
		);
		const [split] = root.splits;
		expect(split.whenTrue).toEqual(
			expect.objectContaining({ _tag: "BinaryDecision" }),
		);
		if (split.whenTrue._tag === "BinaryDecision") {
			const [inner] = split.whenTrue.splits;
			expect(leafValue(inner.whenTrue)).toBe(0.3);
			expect(leafValue(inner.whenFalse)).toBe(0.3);
		}
	});

	it("ignores entries unreachable from the root", () => {
		const root = normalize(
			"0:[os=linux] yes=1,no=2",
			"1:leaf=0.1",
			"2:leaf=0.2",
			"9:[os=mac] yes=404,no=405",
		);
		expect(root.splits).toHaveLength(1);
	});

	it("fails on a reference to a missing identifier", () => {
		const error = normalizeError("0:[os=linux] yes=1,no=7", "1:leaf=0.1");
		expect(error._tag).toBe("DanglingReference");
		if (error._tag === "DanglingReference") {
			expect(error.from).toBe("0");
			expect(error.target).toBe("7");
		}
	});

	it("fails on a cycle with the path that closes it", () => {
		const error = normalizeError(
			"0:[os=linux] yes=1,no=2",
			"1:[country=fr] yes=0,no=2",
			"2:leaf=0.2",
		);
		expect(error._tag).toBe("CyclicReference");
		if (error._tag === "CyclicReference") {
			expect(error.path).toEqual(["0", "1", "0"]);
		}
	});

	it("fails when the root is a leaf", () => {
		const error = normalizeError("0:leaf=0.0");
		expect(error._tag).toBe("NodelessTree");
		if (error._tag === "NodelessTree") {
			expect(error.detail).toBe('root "0" is a leaf; expected at least one node');
		}
	});

	it("fails when the root identifier has no entry", () => {
		const error = Effect.runSync(
			Effect.flip(
				toBinaryTree({
					rootId: "0",
					entries: new Map([["1", new Leaf({ value: 0.1 })]]),
				}),
			),
		);
		expect(error._tag).toBe("NodelessTree");
	});
});
