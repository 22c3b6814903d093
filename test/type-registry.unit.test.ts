import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { TypeRegistry } from "../src/type-registry.js";
import { adtKind, intKind, paramKind, stringKind } from "../src/types.js";

describe("TypeRegistry.registerType", () => {
	it("assigns tags in declaration order", () => {
		const types = new TypeRegistry();
		const result = types.registerType("Color", [
			{ name: "red", args: [] },
			{ name: "green", args: [] },
			{ name: "blue", args: [] },
		]);
		assert.ok(result.ok);
		if (!result.ok) return;
		assert.deepEqual(result.value.constructors.map((c) => [c.name, c.tag]), [["red", 0], ["green", 1], ["blue", 2]]);
		assert.equal(result.value.byName.get("blue")?.tag, 2);
		assert.deepEqual(types.names, ["Color"]);
	});

	it("accepts a self-referential constructor", () => {
		const types = new TypeRegistry();
		const result = types.registerType(
			"List",
			[
				{ name: "empty", args: [] },
				{ name: "cons", args: [paramKind("a"), adtKind("List", [paramKind("a")])] },
			],
			["a"],
		);
		assert.ok(result.ok);
		assert.deepEqual(types.lookup("List")?.params, ["a"]);
	});

	it("accepts references to earlier types", () => {
		const types = new TypeRegistry();
		types.registerType("Color", [{ name: "red", args: [] }]);
		const result = types.registerType("Pixel", [{ name: "pixel", args: [intKind, intKind, adtKind("Color")] }]);
		assert.ok(result.ok);
	});

	it("rejects a duplicate constructor and registers nothing", () => {
		const types = new TypeRegistry();
		const result = types.registerType("Shape", [
			{ name: "rect", args: [intKind, intKind] },
			{ name: "rect", args: [intKind] },
		]);
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, "DuplicateConstructor");
		assert.equal(result.error.message, "Duplicate constructor: Shape declares rect more than once");
		assert.equal(types.has("Shape"), false);
	});

	it("rejects a second type with the same name", () => {
		const types = new TypeRegistry();
		types.registerType("Unit", [{ name: "unit", args: [] }]);
		const result = types.registerType("Unit", [{ name: "unit2", args: [] }]);
		assert.equal(result.ok ? undefined : result.error.code, "DuplicateType");
		assert.equal(types.require("Unit").constructors[0]?.name, "unit");
	});

	it("rejects a repeated type parameter", () => {
		const types = new TypeRegistry();
		const result = types.registerType("Pair", [{ name: "pair", args: [paramKind("a"), paramKind("a")] }], ["a", "a"]);
		assert.equal(result.ok ? undefined : result.error.code, "DuplicateParameter");
	});

	it("rejects references to unknown types and parameters", () => {
		const types = new TypeRegistry();
		const unknownType = types.registerType("Forest", [{ name: "forest", args: [adtKind("Tree")] }]);
		assert.equal(unknownType.ok ? undefined : unknownType.error.code, "UnknownKindReference");
		const unknownParam = types.registerType("Box", [{ name: "box", args: [paramKind("a")] }]);
		assert.equal(unknownParam.ok ? undefined : unknownParam.error.code, "UnknownKindReference");
		assert.deepEqual(types.names, []);
	});

	it("rejects a self reference with the wrong number of arguments", () => {
		const types = new TypeRegistry();
		const result = types.registerType("List", [{ name: "cons", args: [paramKind("a"), adtKind("List")] }], ["a"]);
		assert.equal(result.ok ? undefined : result.error.code, "ArityMismatch");
	});

	it("register takes a type definition document", () => {
		const types = new TypeRegistry();
		const result = types.register({ name: "Name", constructors: [{ name: "name", args: [stringKind] }] });
		assert.ok(result.ok);
		assert.deepEqual(types.require("Name").params, []);
	});
});

describe("TypeRegistry.require", () => {
	it("throws UnknownType for an unregistered name", () => {
		assert.throws(() => new TypeRegistry().require("Tree"), { code: "UnknownType", message: "Unknown type: Tree" });
	});
});
