import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { litInt } from "../src/exprs.js";
import { formatKind, formatSignature, formatValue } from "../src/print.js";
import {
	adtKind,
	boolKind,
	boolVal,
	type ClosureVal,
	fnKind,
	intKind,
	intVal,
	type Kind,
	paramKind,
	stringKind,
	stringVal,
	type Value,
	type VariantVal,
} from "../src/types.js";

function variant(type: string, args: Kind[], ctor: string, values: Value[] = []): VariantVal {
	return { kind: "variant", type: adtKind(type, args), ctor, tag: 0, args: values };
}

function list(values: Value[]): VariantVal {
	let node = variant("List", [intKind], "empty");
	for (const v of [...values].reverse()) node = variant("List", [intKind], "cons", [v, node]);
	return node;
}

describe("formatKind", () => {
	it("prints primitives, parameters and applied types", () => {
		assert.equal(formatKind(intKind), "int");
		assert.equal(formatKind(paramKind("a")), "a");
		assert.equal(formatKind(adtKind("Nat")), "Nat");
		assert.equal(formatKind(adtKind("Pair", [intKind, adtKind("List", [stringKind])])), "Pair<int, List<string>>");
	});

	it("prints function kinds", () => {
		assert.equal(formatKind(fnKind([intKind, paramKind("a")], boolKind)), "fn(int, a) -> bool");
		assert.equal(formatKind(fnKind([], intKind)), "fn() -> int");
	});
});

describe("formatSignature", () => {
	it("prints type parameters, parameters and result", () => {
		const a = paramKind("a");
		const b = paramKind("b");
		assert.equal(
			formatSignature({
				name: "map",
				typeParams: ["a", "b"],
				params: [
					{ name: "xs", type: adtKind("List", [a]) },
					{ name: "f", type: fnKind([a], b) },
				],
				returns: adtKind("List", [b]),
				body: litInt(0),
			}),
			"map<a, b>(xs: List<a>, f: fn(a) -> b): List<b>",
		);
	});

	it("omits the brackets of a non-generic function", () => {
		assert.equal(
			formatSignature({ name: "zero", params: [], returns: intKind, body: litInt(0) }),
			"zero(): int",
		);
	});
});

describe("formatValue", () => {
	it("prints primitives", () => {
		assert.equal(formatValue(intVal(-3)), "-3");
		assert.equal(formatValue(boolVal(true)), "true");
		assert.equal(formatValue(stringVal("say \"hi\"")), "\"say \\\"hi\\\"\"");
	});

	it("prints constructors with and without arguments", () => {
		assert.equal(formatValue(variant("Color", [], "red")), "red");
		assert.equal(formatValue(variant("Shape", [], "rect", [intVal(2), intVal(3)])), "rect(2, 3)");
	});

	it("prints lists and pairs plainly without sugar", () => {
		assert.equal(formatValue(list([intVal(1), intVal(2)])), "cons(1, cons(2, empty))");
		assert.equal(formatValue(variant("Pair", [intKind, intKind], "pair", [intVal(1), intVal(2)])), "pair(1, 2)");
	});

	it("prints lists and pairs with sugar", () => {
		const pair = variant("Pair", [intKind, intKind], "pair", [intVal(1), intVal(2)]);
		assert.equal(formatValue(list([intVal(1), pair]), { sugar: true }), "[1, (1, 2)]");
		assert.equal(formatValue(list([]), { sugar: true }), "[]");
	});

	it("prints deeply nested variants", () => {
		let nat = variant("Nat", [], "zero");
		for (let i = 0; i < 100000; i++) nat = variant("Nat", [], "succ", [nat]);
		assert.equal(formatValue(nat), "succ(".repeat(100000) + "zero" + ")".repeat(100000));
	});

	it("prints closures by name and kind", () => {
		const closure: ClosureVal = {
			kind: "closure",
			type: fnKind([intKind], intKind),
			name: "double",
			params: ["x"],
			body: litInt(0),
			env: new Map(),
			typeEnv: new Map(),
		};
		assert.equal(formatValue(closure), "<double: fn(int) -> int>");
		assert.equal(formatValue({ ...closure, name: undefined }), "<fn(int) -> int>");
	});
});
