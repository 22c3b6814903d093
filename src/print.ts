// tagfold Printing
// Textual rendering of kinds and values

import type { FnDef, Kind, Value, VariantVal } from "./types.js";

export interface FormatOptions {
	/** Render prelude lists as `[a, b]` and pairs as `(a, b)`. */
	sugar?: boolean;
}

//==============================================================================
// Kinds
//==============================================================================

export function formatKind(k: Kind): string {
	switch (k.kind) {
	case "int":
	case "string":
	case "bool":
		return k.kind;
	case "param":
		return k.name;
	case "adt":
		return k.args.length === 0
			? k.name
			: k.name + "<" + k.args.map(formatKind).join(", ") + ">";
	case "fn":
		return "fn(" + k.params.map(formatKind).join(", ") + ") -> " + formatKind(k.returns);
	}
}

/**
 * `map<a, b>(xs: List<a>, f: fn(a) -> b): List<b>`
 */
export function formatSignature(def: FnDef): string {
	const typeParams = def.typeParams ?? [];
	return (
		def.name +
		(typeParams.length > 0 ? "<" + typeParams.join(", ") + ">" : "") +
		"(" +
		def.params.map((p) => p.name + ": " + formatKind(p.type)).join(", ") +
		"): " +
		formatKind(def.returns)
	);
}

//==============================================================================
// Values
//==============================================================================

/** Text already rendered, or a value still to render */
type Piece = string | Value;

/**
 * Render a value. Pieces are expanded from an explicit stack, so values of
 * any depth print without host recursion.
 */
export function formatValue(v: Value, options: FormatOptions = {}): string {
	let out = "";
	const work: Piece[] = [v];
	for (let next = work.pop(); next !== undefined; next = work.pop()) {
		if (typeof next === "string") {
			out += next;
			continue;
		}
		const pieces = expandValue(next, options);
		for (let i = pieces.length - 1; i >= 0; i--) {
			const piece = pieces[i];
			if (piece !== undefined) work.push(piece);
		}
	}
	return out;
}

function expandValue(v: Value, options: FormatOptions): Piece[] {
	switch (v.kind) {
	case "int":
		return [String(v.value)];
	case "bool":
		return [v.value ? "true" : "false"];
	case "string":
		return [JSON.stringify(v.value)];
	case "closure":
		return ["<" + (v.name !== undefined ? v.name + ": " : "") + formatKind(v.type) + ">"];
	case "variant":
		return expandVariant(v, options);
	}
}

function expandVariant(v: VariantVal, options: FormatOptions): Piece[] {
	if (options.sugar === true) {
		const items = listItems(v);
		if (items !== null) return enclose("[", items, "]");
		if (v.type.name === "Pair" && v.ctor === "pair") return enclose("(", v.args, ")");
	}
	if (v.args.length === 0) return [v.ctor];
	return enclose(v.ctor + "(", v.args, ")");
}

function enclose(open: string, values: readonly Value[], close: string): Piece[] {
	const pieces: Piece[] = [open];
	values.forEach((value, i) => {
		if (i > 0) pieces.push(", ");
		pieces.push(value);
	});
	pieces.push(close);
	return pieces;
}

/**
 * Elements of a prelude list, walked iteratively; null when `v` is not one.
 */
function listItems(v: VariantVal): Value[] | null {
	if (v.type.name !== "List") return null;
	const items: Value[] = [];
	let node: Value = v;
	while (node.kind === "variant" && node.ctor === "cons") {
		const [head, tail]: readonly (Value | undefined)[] = node.args;
		if (head === undefined || tail === undefined) return null;
		items.push(head);
		node = tail;
	}
	return node.kind === "variant" && node.ctor === "empty" ? items : null;
}
