// tagfold Environments
// Immutable value/type environments and the function definition table

import type { FnDef, Kind, Value } from "./types.js";

export type ValueEnv = ReadonlyMap<string, Value>;
export type TypeEnv = ReadonlyMap<string, Kind>;
export type Defs = Map<string, FnDef>;

//==============================================================================
// Value Environment
//==============================================================================

export function emptyValueEnv(): ValueEnv {
	return new Map();
}

export function extendValueEnv(env: ValueEnv, name: string, value: Value): ValueEnv {
	const next = new Map(env);
	next.set(name, value);
	return next;
}

export function extendValueEnvMany(
	env: ValueEnv,
	bindings: readonly (readonly [string, Value])[],
): ValueEnv {
	if (bindings.length === 0) return env;
	const next = new Map(env);
	for (const [name, value] of bindings) next.set(name, value);
	return next;
}

export function lookupValue(env: ValueEnv, name: string): Value | undefined {
	return env.get(name);
}

//==============================================================================
// Type Environment
//==============================================================================

export function emptyTypeEnv(): TypeEnv {
	return new Map();
}

//==============================================================================
// Definitions
//==============================================================================

export function emptyDefs(): Defs {
	return new Map();
}

export function lookupDef(defs: Defs, name: string): FnDef | undefined {
	return defs.get(name);
}

export function registerDef(defs: Defs, def: FnDef): void {
	defs.set(def.name, def);
}
