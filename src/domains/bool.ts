// tagfold Bool Domain
// Boolean connectives

import { TagfoldError } from "../errors.js";
import { kindOf } from "../kinds.js";
import { boolKind, boolVal, type Value } from "../types.js";
import {
	defineOperator,
	type Operator,
	type OperatorRegistry,
	registerOperator,
} from "./registry.js";

export function expectBool(v: Value): boolean {
	if (v.kind === "bool") return v.value;
	throw TagfoldError.kindMismatch(boolKind, kindOf(v), "boolean operand");
}

// Both operands are already evaluated: and/or do not short-circuit.
const and: Operator = defineOperator("bool", "and")
	.setParams(boolKind, boolKind)
	.setReturns(boolKind)
	.setImpl((a, b) => boolVal(expectBool(a) && expectBool(b)))
	.build();

const or: Operator = defineOperator("bool", "or")
	.setParams(boolKind, boolKind)
	.setReturns(boolKind)
	.setImpl((a, b) => boolVal(expectBool(a) || expectBool(b)))
	.build();

const not: Operator = defineOperator("bool", "not")
	.setParams(boolKind)
	.setReturns(boolKind)
	.setImpl((a) => boolVal(!expectBool(a)))
	.build();

export function createBoolRegistry(): OperatorRegistry {
	return [and, or, not].reduce<OperatorRegistry>(
		(reg, op) => registerOperator(reg, op),
		new Map(),
	);
}
