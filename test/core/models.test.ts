// CHANGE: Specs for domain models: leaf range, negation, structural equality
// PURITY: CORE
// INVARIANT: makeLeaf(v) succeeds ⇔ 0 <= v <= 1; equal fields ⇒ Equal.equals
// COMPLEXITY: O(1) per assertion

import { Effect, Equal, Exit, HashSet } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { InvalidLeafValue } from "../../src/core/errors.js";
import {
	Condition,
	DecisionNode,
	Leaf,
	makeLeaf,
	negateCondition,
} from "../../src/core/models.js";
import { eq, neq, strategy } from "../utils/builders.js";

describe("makeLeaf", () => {
	it("accepts the boundaries 0.0 and 1.0", () => {
		expect(Effect.runSync(makeLeaf(0)).value).toBe(0);
		expect(Effect.runSync(makeLeaf(1)).value).toBe(1);
	});

	it("rejects values just outside [0, 1]", () => {
		const below = Effect.runSync(Effect.flip(makeLeaf(-0.000000000001)));
		const above = Effect.runSync(Effect.flip(makeLeaf(1.000000000001)));
		expect(below).toBeInstanceOf(InvalidLeafValue);
		expect(below.value).toBe(-0.000000000001);
		expect(above.value).toBe(1.000000000001);
	});

	it("rejects NaN", () => {
		const error = Effect.runSync(Effect.flip(makeLeaf(Number.NaN)));
		expect(error._tag).toBe("InvalidLeafValue");
	});

	it("succeeds exactly for values in [0, 1]", () => {
		fc.assert(
			fc.property(fc.double({ min: 0, max: 1, noNaN: true }), (value) =>
				Exit.isSuccess(Effect.runSyncExit(makeLeaf(value))),
			),
		);
		fc.assert(
			fc.property(
				fc.double({ noNaN: true }).filter((value) => value < 0 || value > 1),
				(value) => Exit.isFailure(Effect.runSyncExit(makeLeaf(value))),
			),
		);
	});
});

describe("Leaf constructor", () => {
	it("throws InvalidLeafValue instead of clamping", () => {
		expect(() => new Leaf({ value: 2 })).toThrow(InvalidLeafValue);
	});

	it("keeps the value untouched", () => {
		expect(new Leaf({ value: 0.25 }).value).toBe(0.25);
	});
});

describe("negateCondition", () => {
	it("flips isEqual and keeps feature and value", () => {
		const negated = negateCondition(eq("device_type", "pc"));
		expect(negated.feature).toBe("device_type");
		expect(negated.value).toBe("pc");
		expect(negated.isEqual).toBe(false);
	});

	it("is an involution", () => {
		fc.assert(
			fc.property(fc.string(), fc.string(), fc.boolean(), (feature, value, isEqual) => {
				const condition = new Condition({ feature, value, isEqual });
				return Equal.equals(negateCondition(negateCondition(condition)), condition);
			}),
		);
	});
});

describe("structural equality", () => {
	it("treats conditions with identical fields as equal", () => {
		expect(Equal.equals(eq("os", "linux"), eq("os", "linux"))).toBe(true);
		expect(Equal.equals(eq("os", "linux"), neq("os", "linux"))).toBe(false);
	});

	it("collapses identical strategies in a HashSet", () => {
		const set = HashSet.make(
			strategy([eq("os", "linux"), neq("country", "fr")], 0.1),
			strategy([eq("os", "linux"), neq("country", "fr")], 0.1),
		);
		expect(HashSet.size(set)).toBe(1);
	});

	it("distinguishes condition order and leaf value", () => {
		const base = strategy([eq("os", "linux"), eq("country", "fr")], 0.1);
		expect(
			Equal.equals(base, strategy([eq("country", "fr"), eq("os", "linux")], 0.1)),
		).toBe(false);
		expect(
			Equal.equals(base, strategy([eq("os", "linux"), eq("country", "fr")], 0.2)),
		).toBe(false);
	});

	it("does not share the caller's condition array", () => {
		const conditions = [eq("os", "linux")];
		const built = strategy(conditions, 0.5);
		conditions.push(eq("country", "fr"));
		expect(built.conditions).toHaveLength(1);
	});

	it("keeps node branches and conditions as given", () => {
		const node = new DecisionNode({ conditions: [eq("os", "linux")], yes: "1", no: "2" });
		expect(node._tag).toBe("DecisionNode");
		expect(node.yes).toBe("1");
		expect(node.no).toBe("2");
		expect(node.conditions).toHaveLength(1);
	});
});
