import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { constructVariant } from "../src/construct.js";
import { TypeRegistry } from "../src/type-registry.js";
import {
	adtKind,
	boolVal,
	intKind,
	intVal,
	paramKind,
	stringKind,
	stringVal,
	type Value,
} from "../src/types.js";

function listRegistry(): TypeRegistry {
	const types = new TypeRegistry();
	types.registerType(
		"List",
		[
			{ name: "empty", args: [] },
			{ name: "cons", args: [paramKind("a"), adtKind("List", [paramKind("a")])] },
		],
		["a"],
	);
	types.registerType("Shape", [
		{ name: "rect", args: [intKind, intKind] },
		{ name: "label", args: [stringKind] },
	]);
	return types;
}

const intList = adtKind("List", [intKind]);

describe("constructVariant", () => {
	const types = listRegistry();

	it("builds a tagged value carrying its resolved type", () => {
		const empty = constructVariant(types, intList, "empty", []);
		const one = constructVariant(types, intList, "cons", [intVal(1), empty]);
		assert.equal(one.ctor, "cons");
		assert.equal(one.tag, 1);
		assert.deepEqual(one.type, intList);
		assert.deepEqual(one.args, [intVal(1), empty]);
	});

	it("returns frozen values", () => {
		const rect = constructVariant(types, adtKind("Shape"), "rect", [intVal(2), intVal(3)]);
		assert.ok(Object.isFrozen(rect));
		assert.ok(Object.isFrozen(rect.args));
	});

	it("does not share the caller's argument array", () => {
		const args: Value[] = [stringVal("a")];
		const label = constructVariant(types, adtKind("Shape"), "label", args);
		args.push(stringVal("b"));
		assert.equal(label.args.length, 1);
	});

	it("rejects an unknown type", () => {
		assert.throws(() => constructVariant(types, adtKind("Tree"), "leaf", []), { code: "UnknownType" });
	});

	it("rejects an unknown constructor", () => {
		assert.throws(
			() => constructVariant(types, intList, "nil", []),
			{ code: "UnknownConstructor", message: "Unknown constructor: List has no constructor nil" },
		);
	});

	it("rejects the wrong number of arguments", () => {
		assert.throws(
			() => constructVariant(types, intList, "cons", [intVal(1)]),
			{ code: "ArityMismatch", message: "Arity mismatch: constructor cons expects 2, got 1" },
		);
	});

	it("rejects the wrong number of type arguments", () => {
		assert.throws(
			() => constructVariant(types, adtKind("List"), "empty", []),
			{ code: "ArityMismatch", message: "Arity mismatch: type arguments of List expects 1, got 0" },
		);
	});

	it("rejects an argument of the wrong kind and reports its position", () => {
		const empty = constructVariant(types, intList, "empty", []);
		assert.throws(
			() => constructVariant(types, intList, "cons", [boolVal(true), empty]),
			{
				code: "KindMismatch",
				message: "Kind mismatch (argument 0 of cons): expected int, got bool",
				position: 0,
			},
		);
	});

	it("checks recursive arguments against the substituted type", () => {
		const strings = constructVariant(types, adtKind("List", [stringKind]), "empty", []);
		assert.throws(
			() => constructVariant(types, intList, "cons", [intVal(1), strings]),
			{
				code: "KindMismatch",
				message: "Kind mismatch (argument 1 of cons): expected List<int>, got List<string>",
				position: 1,
			},
		);
	});
});
