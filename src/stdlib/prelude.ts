// tagfold Prelude
// Sequences, optionals, pairs, tagged unions and naturals, plus the
// structurally recursive functions over them (length, map, filter, zip, ...).

import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { constructVariant } from "../construct.js";
import { TagfoldError } from "../errors.js";
import { Evaluator } from "../evaluator.js";
import { kindOf } from "../kinds.js";
import type { TypeRegistry } from "../type-registry.js";
import { type AdtKind, adtKind, type Kind, type Value, type VariantVal } from "../types.js";
import { loadLibraryFile } from "./loader.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const PRELUDE_PATH = resolve(__dirname, "prelude.json");

export interface EvaluatorOptions {
	/** Load the prelude types and functions (default true) */
	prelude?: boolean | undefined;
}

/**
 * Create an evaluator with the kernel operators and, unless disabled, the
 * prelude.
 */
export function createEvaluator(options: EvaluatorOptions = {}): Evaluator {
	const evaluator = new Evaluator();
	if (options.prelude ?? true) {
		const loaded = loadLibraryFile(evaluator, PRELUDE_PATH);
		if (!loaded.ok) {
			throw new Error("Prelude failed to load: " + loaded.error.message);
		}
	}
	return evaluator;
}

//==============================================================================
// Kind Helpers
//==============================================================================

export const listKind = (of: Kind): AdtKind => adtKind("List", [of]);
export const optionKind = (of: Kind): AdtKind => adtKind("Option", [of]);
export const pairKind = (a: Kind, b: Kind): AdtKind => adtKind("Pair", [a, b]);
export const eitherKind = (a: Kind, b: Kind): AdtKind => adtKind("Either", [a, b]);
export const natKind: AdtKind = adtKind("Nat");

//==============================================================================
// Value Helpers (require the prelude types to be registered)
//==============================================================================

/**
 * Build `cons(v0, cons(v1, ... empty))`, innermost first.
 */
export function listOf(types: TypeRegistry, of: Kind, values: readonly Value[]): VariantVal {
	const kind = listKind(of);
	let list = constructVariant(types, kind, "empty", []);
	for (let i = values.length - 1; i >= 0; i--) {
		const v = values[i];
		if (v !== undefined) list = constructVariant(types, kind, "cons", [v, list]);
	}
	return list;
}

/**
 * Elements of a prelude list, walked iteratively.
 */
export function listToArray(v: Value): Value[] {
	const items: Value[] = [];
	let node = v;
	for (;;) {
		if (node.kind !== "variant" || node.type.name !== "List") {
			throw TagfoldError.kindMismatch(listKind({ kind: "param", name: "a" }), kindOf(node), "list");
		}
		const [head, tail] = node.args;
		if (head === undefined || tail === undefined) return items;
		items.push(head);
		node = tail;
	}
}

export function someOf(types: TypeRegistry, of: Kind, v: Value): VariantVal {
	return constructVariant(types, optionKind(of), "some", [v]);
}

export function noneOf(types: TypeRegistry, of: Kind): VariantVal {
	return constructVariant(types, optionKind(of), "none", []);
}

export function pairOf(types: TypeRegistry, a: Kind, b: Kind, x: Value, y: Value): VariantVal {
	return constructVariant(types, pairKind(a, b), "pair", [x, y]);
}

/**
 * `succ^n(zero)`
 */
export function natOf(types: TypeRegistry, n: number): VariantVal {
	let nat = constructVariant(types, natKind, "zero", []);
	for (let i = 0; i < n; i++) nat = constructVariant(types, natKind, "succ", [nat]);
	return nat;
}
