// tagfold Value Construction
// Arity- and kind-checked application of constructors

import { TagfoldError } from "./errors.js";
import { bindTypeParams, kindEqual, kindOf, substituteKind } from "./kinds.js";
import type { TypeRegistry } from "./type-registry.js";
import type { AdtKind, Value, VariantVal } from "./types.js";

/**
 * Build an immutable tagged value of `type` (fully resolved) with `ctor`.
 *
 * Checks, in order: the constructor exists, the argument count matches its
 * arity, and every argument's kind matches the declared kind at its position.
 */
export function constructVariant(
	registry: TypeRegistry,
	type: AdtKind,
	ctor: string,
	args: readonly Value[],
): VariantVal {
	const info = registry.require(type.name);
	const c = info.byName.get(ctor);
	if (c === undefined) throw TagfoldError.unknownConstructor(type.name, ctor);

	const typeEnv = bindTypeParams(type.name, info.params, type.args);
	if (args.length !== c.args.length) {
		throw TagfoldError.arityMismatch("constructor " + ctor, c.args.length, args.length);
	}

	c.args.forEach((declared, i) => {
		const arg = args[i];
		if (arg === undefined) return;
		const expected = substituteKind(declared, typeEnv);
		const actual = kindOf(arg);
		if (!kindEqual(expected, actual)) {
			throw TagfoldError.kindMismatch(expected, actual, "argument " + String(i) + " of " + ctor, i);
		}
	});

	return Object.freeze({
		kind: "variant",
		type,
		ctor,
		tag: c.tag,
		args: Object.freeze([...args]),
	});
}
