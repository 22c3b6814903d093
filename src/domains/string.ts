// tagfold String Domain

import { TagfoldError } from "../errors.js";
import { kindOf } from "../kinds.js";
import {
	boolKind,
	boolVal,
	intKind,
	intVal,
	stringKind,
	stringVal,
	type Value,
} from "../types.js";
import {
	defineOperator,
	type Operator,
	type OperatorRegistry,
	registerOperator,
} from "./registry.js";

export function expectString(v: Value): string {
	if (v.kind === "string") return v.value;
	throw TagfoldError.kindMismatch(stringKind, kindOf(v), "string operand");
}

// concat(string, string) -> string
const concat: Operator = defineOperator("string", "concat")
	.setParams(stringKind, stringKind)
	.setReturns(stringKind)
	.setImpl((a, b) => stringVal(expectString(a) + expectString(b)))
	.build();

// length(string) -> int, in UTF-16 code units
const length: Operator = defineOperator("string", "length")
	.setParams(stringKind)
	.setReturns(intKind)
	.setImpl((a) => intVal(expectString(a).length))
	.build();

// eq(string, string) -> bool
const eq: Operator = defineOperator("string", "eq")
	.setParams(stringKind, stringKind)
	.setReturns(boolKind)
	.setImpl((a, b) => boolVal(expectString(a) === expectString(b)))
	.build();

export function createStringRegistry(): OperatorRegistry {
	return [concat, length, eq].reduce<OperatorRegistry>(
		(reg, op) => registerOperator(reg, op),
		new Map(),
	);
}
