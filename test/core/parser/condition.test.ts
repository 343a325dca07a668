// CHANGE: Specs for condition and OR-expression parsing
// PURITY: CORE
// INVARIANT: "!=" wins over "="; more than two operands fail with UnsupportedCombinator

import { Effect, Equal } from "effect";
import { describe, expect, it } from "vitest";

import {
	parseCondition,
	parseConditionExpression,
} from "../../../src/core/parser/condition.js";
import { eq, neq } from "../../utils/builders.js";

const LINE = "0:[expr] yes=1,no=2";

describe("parseCondition", () => {
	it("parses an equality", () => {
		const condition = Effect.runSync(parseCondition("device_type=pc", LINE));
		expect(Equal.equals(condition, eq("device_type", "pc"))).toBe(true);
	});

	it("parses an inequality before trying equality", () => {
		const condition = Effect.runSync(parseCondition("device_type!=pc", LINE));
		expect(Equal.equals(condition, neq("device_type", "pc"))).toBe(true);
	});

	it("rejects a condition without operator", () => {
		const error = Effect.runSync(Effect.flip(parseCondition("device_type", LINE)));
		expect(error._tag).toBe("UnparsableLine");
		expect(error.line).toBe(LINE);
		expect(error.reason).toBe('expected exactly one "=" in condition "device_type"');
	});

	it("rejects repeated operators", () => {
		const error = Effect.runSync(Effect.flip(parseCondition("a=b=c", LINE)));
		expect(error.reason).toBe('expected exactly one "=" in condition "a=b=c"');
	});

	it("rejects an empty feature or value", () => {
		const emptyValue = Effect.runSync(Effect.flip(parseCondition("os!=", LINE)));
		const emptyFeature = Effect.runSync(Effect.flip(parseCondition("=linux", LINE)));
		expect(emptyValue.reason).toBe('condition "os!=" needs a non-empty feature and value');
		expect(emptyFeature.reason).toBe(
			'condition "=linux" needs a non-empty feature and value',
		);
	});

	it("rejects whitespace inside a token", () => {
		const error = Effect.runSync(Effect.flip(parseCondition("os = linux", LINE)));
		expect(error._tag).toBe("UnparsableLine");
	});
});

describe("parseConditionExpression", () => {
	it("returns a single condition for a plain test", () => {
		const conditions = Effect.runSync(parseConditionExpression("os=linux", LINE));
		expect(conditions).toHaveLength(1);
		expect(Equal.equals(conditions[0], eq("os", "linux"))).toBe(true);
	});

	it("returns both operands of an OR in order", () => {
		const conditions = Effect.runSync(
			parseConditionExpression("device_type=pc||or||support!=mobile", LINE),
		);
		expect(conditions).toHaveLength(2);
		expect(Equal.equals(conditions[0], eq("device_type", "pc"))).toBe(true);
		expect(Equal.equals(conditions[1], neq("support", "mobile"))).toBe(true);
	});

	it("fails for three operands", () => {
		const error = Effect.runSync(
			Effect.flip(parseConditionExpression("a=1||or||b=2||or||c=3", LINE)),
		);
		expect(error._tag).toBe("UnsupportedCombinator");
		if (error._tag === "UnsupportedCombinator") {
			expect(error.operands).toBe(3);
			expect(error.expression).toBe("a=1||or||b=2||or||c=3");
		}
	});

	it("fails when one operand is malformed", () => {
		const error = Effect.runSync(
			Effect.flip(parseConditionExpression("a=1||or||b", LINE)),
		);
		expect(error._tag).toBe("UnparsableLine");
	});

	it("fails for an empty expression", () => {
		const error = Effect.runSync(Effect.flip(parseConditionExpression("", LINE)));
		expect(error._tag).toBe("UnparsableLine");
	});
});
