import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { emptyValueEnv, extendValueEnv } from "../src/env.js";
import type { Result } from "../src/errors.js";
import { apply, callOp, caseOf, lambda, litInt, match, param, varRef } from "../src/exprs.js";
import { formatValue } from "../src/print.js";
import {
	createEvaluator,
	listKind,
	listOf,
	listToArray,
	natKind,
	natOf,
	noneOf,
	optionKind,
	pairOf,
	someOf,
} from "../src/stdlib/prelude.js";
import {
	boolKind,
	type Expr,
	intKind,
	intVal,
	type Kind,
	stringKind,
	stringVal,
	type Value,
} from "../src/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ev = createEvaluator();
const types = ev.types;

const ints = (values: number[]): Value => listOf(types, intKind, values.map(intVal));
const strs = (values: string[]): Value => listOf(types, stringKind, values.map(stringVal));

function call(name: string, typeArgs: Kind[], args: Record<string, Value>): Result<Value> {
	let env = emptyValueEnv();
	const argExprs: Expr[] = [];
	for (const [key, v] of Object.entries(args)) {
		env = extendValueEnv(env, key, v);
		argExprs.push(varRef(key));
	}
	return ev.evaluate(apply(name, argExprs, typeArgs), env);
}

function show(result: Result<Value>): string {
	if (!result.ok) assert.fail(result.error.code + ": " + result.error.message);
	return formatValue(result.value, { sugar: true });
}

const atLeast = (n: number): Expr =>
	lambda([param("x", intKind)], boolKind, callOp("core", "gte", varRef("x"), litInt(n)));

// ===========================================================================
// Loading
// ===========================================================================

describe("prelude loading", () => {
	it("registers the prelude types", () => {
		assert.deepEqual(types.names, ["List", "Option", "Pair", "Either", "Nat"]);
	});

	it("defines the prelude functions", () => {
		for (const name of ["length", "map", "filter", "zip", "take", "findFirst", "lastEntry", "append", "reverse", "pred", "natToInt"]) {
			assert.ok(ev.defs.has(name), name);
		}
	});

	it("can be left out", () => {
		const bare = createEvaluator({ prelude: false });
		assert.deepEqual(bare.types.names, []);
		assert.equal(bare.defs.size, 0);
	});

	it("gives every evaluator its own registries", () => {
		const other = createEvaluator();
		other.registerType("Mushroom", [{ name: "cap", args: [] }]);
		assert.equal(types.has("Mushroom"), false);
	});
});

// ===========================================================================
// Host helpers
// ===========================================================================

describe("prelude helpers", () => {
	it("listOf and listToArray convert between arrays and lists", () => {
		const list = ints([1, 2, 3]);
		assert.deepEqual(listToArray(list), [intVal(1), intVal(2), intVal(3)]);
		assert.equal(formatValue(list), "cons(1, cons(2, cons(3, empty)))");
		assert.deepEqual(listToArray(listOf(types, intKind, [])), []);
	});

	it("listToArray rejects anything but a list", () => {
		assert.throws(() => listToArray(intVal(1)), { code: "KindMismatch" });
	});

	it("builds optionals, pairs and naturals", () => {
		assert.equal(formatValue(someOf(types, intKind, intVal(1))), "some(1)");
		assert.equal(formatValue(noneOf(types, intKind)), "none");
		assert.equal(formatValue(pairOf(types, intKind, stringKind, intVal(1), stringVal("a")), { sugar: true }), "(1, \"a\")");
		assert.equal(formatValue(natOf(types, 2)), "succ(succ(zero))");
	});

	it("keeps a nested absent optional distinct from an absent one", () => {
		const inner = noneOf(types, intKind);
		const nested = someOf(types, optionKind(intKind), inner);
		assert.equal(formatValue(nested), "some(none)");
		assert.equal(nested.ctor, "some");
		assert.deepEqual(nested.args, [inner]);
	});
});

// ===========================================================================
// Functions
// ===========================================================================

describe("prelude functions", () => {
	it("length counts elements", () => {
		assert.equal(show(call("length", [intKind], { xs: ints([1, 2, 3]) })), "3");
		assert.equal(show(call("length", [intKind], { xs: ints([]) })), "0");
	});

	it("take keeps at most n elements", () => {
		const xs = strs(["bolete", "oyster"]);
		assert.equal(show(call("take", [stringKind], { n: intVal(1), xs })), "[\"bolete\"]");
		assert.equal(show(call("take", [stringKind], { n: intVal(3), xs })), "[\"bolete\", \"oyster\"]");
		assert.equal(show(call("take", [stringKind], { n: intVal(0), xs })), "[]");
		assert.equal(show(call("take", [stringKind], { n: intVal(-2), xs })), "[]");
	});

	it("zip stops at the shorter list", () => {
		const result = call("zip", [intKind, stringKind], { xs: ints([1, 2, 3]), ys: strs(["a", "b"]) });
		assert.equal(show(result), "[(1, \"a\"), (2, \"b\")]");
	});

	it("findFirst returns the first match or none", () => {
		const env = extendValueEnv(emptyValueEnv(), "xs", ints([1, 2, 3]));
		const found = ev.evaluate(apply("findFirst", [varRef("xs"), atLeast(2)], [intKind]), env);
		assert.equal(show(found), "some(2)");
		const missing = ev.evaluate(apply("findFirst", [varRef("xs"), atLeast(5)], [intKind]), env);
		assert.equal(show(missing), "none");
	});

	it("map and filter apply closures", () => {
		const env = extendValueEnv(emptyValueEnv(), "xs", ints([1, 2, 3, 4]));
		const big = apply("filter", [varRef("xs"), atLeast(3)], [intKind]);
		const doubled = apply(
			"map",
			[big, lambda([param("x", intKind)], intKind, callOp("core", "mul", varRef("x"), litInt(2)))],
			[intKind, intKind],
		);
		assert.equal(show(ev.evaluate(doubled, env)), "[6, 8]");
	});

	it("map rejects a function of the wrong kind", () => {
		const env = extendValueEnv(emptyValueEnv(), "xs", ints([1]));
		const result = ev.evaluate(apply("map", [varRef("xs"), atLeast(0)], [intKind, intKind]), env);
		assert.equal(
			result.ok ? undefined : result.error.message,
			"Kind mismatch (argument 1 of map): expected fn(int) -> int, got fn(int) -> bool",
		);
	});

	it("lastEntry, append and reverse", () => {
		assert.equal(show(call("lastEntry", [intKind], { xs: ints([1, 2, 3]) })), "some(3)");
		assert.equal(show(call("lastEntry", [intKind], { xs: ints([]) })), "none");
		assert.equal(show(call("append", [intKind], { xs: ints([1]), ys: ints([2, 3]) })), "[1, 2, 3]");
		assert.equal(show(call("reverse", [intKind], { xs: ints([1, 2, 3]) })), "[3, 2, 1]");
	});

	it("pred and natToInt walk naturals", () => {
		assert.equal(show(call("pred", [], { n: natOf(types, 2) })), "succ(zero)");
		assert.equal(show(call("pred", [], { n: natOf(types, 0) })), "zero");
		assert.equal(show(call("natToInt", [], { n: natOf(types, 4) })), "4");
	});

	it("matches on prelude values from user expressions", () => {
		const env = extendValueEnv(emptyValueEnv(), "o", someOf(types, intKind, intVal(41)));
		const expr = match("Option", varRef("o"), [
			caseOf("none", [], litInt(0)),
			caseOf("some", ["v"], callOp("core", "add", varRef("v"), litInt(1))),
		]);
		assert.equal(show(ev.evaluate(expr, env)), "42");
	});

	it("recurses up to the default depth", () => {
		const upTo = (n: number): Value => ints(Array.from({ length: n }, (_, i) => i));
		const long = upTo(1999);
		assert.equal(show(call("length", [intKind], { xs: long })), "1999");
		assert.equal(listToArray(long).length, 1999);
		assert.equal(show(call("natToInt", [], { n: natOf(types, 1900) })), "1900");

		const over = call("length", [intKind], { xs: upTo(2001) });
		assert.equal(over.ok ? undefined : over.error.message, "Stack exhausted: recursion deeper than 2000 frames");
	});

	it("recurses past the default depth when allowed", () => {
		const xs = ints(Array.from({ length: 5000 }, (_, i) => i));
		const env = extendValueEnv(emptyValueEnv(), "xs", xs);
		assert.equal(show(ev.evaluate(apply("length", [varRef("xs")], [intKind]), env, { maxDepth: 10000 })), "5000");
	});

	it("checks the kinds of list arguments", () => {
		const result = call("length", [stringKind], { xs: ints([1]) });
		assert.equal(result.ok ? undefined : result.error.code, "KindMismatch");
		assert.deepEqual(listKind(natKind), { kind: "adt", name: "List", args: [{ kind: "adt", name: "Nat", args: [] }] });
	});
});
