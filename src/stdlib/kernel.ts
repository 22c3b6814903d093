// tagfold Kernel
// Native operators available to every evaluator

import { createBoolRegistry } from "../domains/bool.js";
import { createCoreRegistry } from "../domains/core.js";
import { mergeRegistries, type OperatorRegistry } from "../domains/registry.js";
import { createStringRegistry } from "../domains/string.js";

export function createKernelRegistry(): OperatorRegistry {
	return mergeRegistries(
		createCoreRegistry(),
		createBoolRegistry(),
		createStringRegistry(),
	);
}
