import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createBoolRegistry } from "../src/domains/bool.js";
import { createCoreRegistry, valueEqual } from "../src/domains/core.js";
import {
	applyOperator,
	defineOperator,
	lookupOperator,
	mergeRegistries,
	type OperatorRegistry,
	registerOperator,
} from "../src/domains/registry.js";
import { createStringRegistry } from "../src/domains/string.js";
import { createKernelRegistry } from "../src/stdlib/kernel.js";
import {
	adtKind,
	boolVal,
	intKind,
	intVal,
	stringVal,
	type Value,
	type VariantVal,
} from "../src/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const kernel = createKernelRegistry();

function op(ns: string, name: string, ...args: Value[]): Value {
	const found = lookupOperator(kernel, ns, name);
	if (found === undefined) assert.fail("missing operator " + ns + ":" + name);
	return applyOperator(found, args);
}

function variant(type: string, ctor: string, tag: number, args: Value[] = []): VariantVal {
	return { kind: "variant", type: adtKind(type), ctor, tag, args };
}

// ===========================================================================
// Core domain
// ===========================================================================

describe("core domain", () => {
	it("does integer arithmetic", () => {
		assert.deepEqual(op("core", "add", intVal(2), intVal(3)), intVal(5));
		assert.deepEqual(op("core", "sub", intVal(2), intVal(3)), intVal(-1));
		assert.deepEqual(op("core", "mul", intVal(4), intVal(3)), intVal(12));
		assert.deepEqual(op("core", "neg", intVal(4)), intVal(-4));
	});

	it("truncates division toward zero", () => {
		assert.deepEqual(op("core", "div", intVal(7), intVal(2)), intVal(3));
		assert.deepEqual(op("core", "div", intVal(-7), intVal(2)), intVal(-3));
		assert.deepEqual(op("core", "mod", intVal(-7), intVal(2)), intVal(-1));
	});

	it("signals DivideByZero", () => {
		assert.throws(() => op("core", "div", intVal(1), intVal(0)), { code: "DivideByZero" });
		assert.throws(() => op("core", "mod", intVal(1), intVal(0)), { code: "DivideByZero" });
	});

	it("signals IntegerOverflow when a result leaves the safe integer range", () => {
		const max = intVal(Number.MAX_SAFE_INTEGER);
		assert.throws(() => op("core", "mul", max, max), { code: "IntegerOverflow" });
		assert.throws(() => op("core", "add", max, intVal(1)), {
			code: "IntegerOverflow",
			message: "Integer overflow: core:add produced 9007199254740992, outside the safe integer range",
		});
		assert.throws(() => op("core", "sub", intVal(Number.MIN_SAFE_INTEGER), intVal(1)), { code: "IntegerOverflow" });
		assert.deepEqual(op("core", "add", max, intVal(-1)), intVal(Number.MAX_SAFE_INTEGER - 1));
	});

	it("compares integers", () => {
		assert.deepEqual(op("core", "lt", intVal(1), intVal(2)), boolVal(true));
		assert.deepEqual(op("core", "lte", intVal(2), intVal(2)), boolVal(true));
		assert.deepEqual(op("core", "gt", intVal(1), intVal(2)), boolVal(false));
		assert.deepEqual(op("core", "gte", intVal(1), intVal(2)), boolVal(false));
	});

	it("compares any values structurally with eq and neq", () => {
		const some1 = variant("Option", "some", 1, [intVal(1)]);
		assert.deepEqual(op("core", "eq", some1, variant("Option", "some", 1, [intVal(1)])), boolVal(true));
		assert.deepEqual(op("core", "eq", some1, variant("Option", "some", 1, [intVal(2)])), boolVal(false));
		assert.deepEqual(op("core", "neq", intVal(1), stringVal("1")), boolVal(true));
	});

	it("rejects operands of the wrong kind with their position", () => {
		assert.throws(
			() => op("core", "add", intVal(1), stringVal("2")),
			{
				code: "KindMismatch",
				message: "Kind mismatch (operand 1 of core:add): expected int, got string",
				position: 1,
			},
		);
	});

	it("rejects the wrong number of operands", () => {
		assert.throws(
			() => op("core", "neg", intVal(1), intVal(2)),
			{ code: "ArityMismatch", message: "Arity mismatch: operator core:neg expects 1, got 2" },
		);
	});
});

describe("valueEqual", () => {
	it("distinguishes variants of different types with the same tag", () => {
		assert.equal(valueEqual(variant("A", "x", 0), variant("B", "x", 0)), false);
	});

	it("compares deeply nested variants", () => {
		const nat = (n: number, base: Value): Value => {
			let v = base;
			for (let i = 0; i < n; i++) v = variant("Nat", "succ", 1, [v]);
			return v;
		};
		const zero = variant("Nat", "zero", 0);
		assert.equal(valueEqual(nat(100000, zero), nat(100000, zero)), true);
		assert.equal(valueEqual(nat(100000, zero), nat(100000, variant("Nat", "succ", 1, [zero]))), false);
	});

	it("never equates closures", () => {
		const closure: Value = {
			kind: "closure",
			type: { kind: "fn", params: [], returns: intKind },
			params: [],
			body: { kind: "lit", type: { kind: "int" }, value: 1 },
			env: new Map(),
			typeEnv: new Map(),
		};
		assert.equal(valueEqual(closure, closure), false);
	});
});

// ===========================================================================
// Bool and string domains
// ===========================================================================

describe("bool domain", () => {
	it("implements and, or, not", () => {
		assert.deepEqual(op("bool", "and", boolVal(true), boolVal(false)), boolVal(false));
		assert.deepEqual(op("bool", "or", boolVal(true), boolVal(false)), boolVal(true));
		assert.deepEqual(op("bool", "not", boolVal(true)), boolVal(false));
	});

	it("rejects non-boolean operands", () => {
		assert.throws(() => op("bool", "not", intVal(0)), { code: "KindMismatch" });
	});
});

describe("string domain", () => {
	it("concatenates, measures and compares", () => {
		assert.deepEqual(op("string", "concat", stringVal("shii"), stringVal("take")), stringVal("shiitake"));
		assert.deepEqual(op("string", "length", stringVal("enoki")), intVal(5));
		assert.deepEqual(op("string", "eq", stringVal("a"), stringVal("a")), boolVal(true));
	});
});

// ===========================================================================
// Registry
// ===========================================================================

describe("operator registry", () => {
	it("merges the kernel domains", () => {
		assert.equal(kernel.size, createCoreRegistry().size + createBoolRegistry().size + createStringRegistry().size);
		assert.equal(kernel.size, 18);
	});

	it("registers without mutating the original registry", () => {
		const empty: OperatorRegistry = new Map();
		const double = defineOperator("test", "double")
			.setParams(intKind)
			.setReturns(intKind)
			.setImpl((x) => intVal(x.kind === "int" ? x.value * 2 : 0))
			.build();
		const next = registerOperator(empty, double);
		assert.equal(empty.size, 0);
		assert.equal(lookupOperator(next, "test", "double"), double);
		assert.equal(mergeRegistries(kernel, next).size, 19);
	});

	it("refuses to build an operator without an implementation", () => {
		assert.throws(() => defineOperator("test", "nothing").build(), /has no implementation/);
	});
});
