// tagfold Type Registry
// Closed variant types: registration and lookup

import { attempt, type Result, TagfoldError } from "./errors.js";
import { checkDistinct, checkKindRefs, type KindScope } from "./kinds.js";
import type { ConstructorDef, Kind, TypeDef } from "./types.js";

//==============================================================================
// Registered Types
//==============================================================================

export interface ConstructorInfo {
	readonly name: string;
	readonly tag: number;
	readonly args: readonly Kind[];
}

export interface TypeInfo {
	readonly name: string;
	readonly params: readonly string[];
	/** Indexed by tag */
	readonly constructors: readonly ConstructorInfo[];
	readonly byName: ReadonlyMap<string, ConstructorInfo>;
}

//==============================================================================
// Registry
//==============================================================================

export class TypeRegistry {
	private readonly types = new Map<string, TypeInfo>();

	/**
	 * Register a closed variant type. Nothing is registered on failure.
	 *
	 * A constructor argument may refer to the type being declared, which is
	 * how recursive types are written.
	 */
	registerType(
		name: string,
		constructors: readonly ConstructorDef[],
		params: readonly string[] = [],
	): Result<TypeInfo> {
		return attempt(() => {
			const info = this.prepare(name, constructors, params);
			this.types.set(name, info);
			return info;
		});
	}

	register(def: TypeDef): Result<TypeInfo> {
		return this.registerType(def.name, def.constructors, def.params ?? []);
	}

	has(name: string): boolean {
		return this.types.has(name);
	}

	lookup(name: string): TypeInfo | undefined {
		return this.types.get(name);
	}

	/** Like lookup, throwing UnknownType when absent */
	require(name: string): TypeInfo {
		const info = this.types.get(name);
		if (info === undefined) throw TagfoldError.unknownType(name);
		return info;
	}

	get names(): string[] {
		return [...this.types.keys()];
	}

	private prepare(
		name: string,
		constructors: readonly ConstructorDef[],
		params: readonly string[],
	): TypeInfo {
		if (this.types.has(name)) throw TagfoldError.duplicateType(name);
		checkDistinct("type " + name, params);

		const byName = new Map<string, ConstructorInfo>();
		const infos = constructors.map((c, tag): ConstructorInfo => {
			if (byName.has(c.name)) throw TagfoldError.duplicateConstructor(name, c.name);
			const scope = this.scopeFor(name, params, "argument of " + name + "." + c.name);
			for (const arg of c.args) checkKindRefs(arg, scope);
			const info = { name: c.name, tag, args: [...c.args] };
			byName.set(c.name, info);
			return info;
		});

		return { name, params: [...params], constructors: infos, byName };
	}

	private scopeFor(self: string, params: readonly string[], context: string): KindScope {
		return {
			arityOf: (ref) => ref === self ? params.length : this.types.get(ref)?.params.length,
			params: new Set(params),
			context,
		};
	}
}
