// Generate JSON Schema files from Zod schemas
// Usage: tsx scripts/generate-schemas.ts

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { librarySchema, programSchema } from "../src/schemas.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const outDir = resolve(__dirname, "..", "schemas");

/**
 * JSON Schema key priority order; everything else follows alphabetically.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "additionalProperties", "required",
	"items", "minItems", "maxItems",
	"oneOf", "anyOf", "allOf",
	"minimum", "maximum", "pattern", "format",
];

function isRecord(obj: unknown): obj is Record<string, unknown> {
	return typeof obj === "object" && obj !== null && !Array.isArray(obj);
}

function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);
	const priorityOrder = "$ref" in record ? ["$ref"] : jsonSchemaKeyOrder;
	const prioritySet = new Set(priorityOrder);
	const priorityKeys = priorityOrder.filter((k) => keys.includes(k));
	const remainingKeys = keys.filter((k) => !prioritySet.has(k)).sort();
	return [...priorityKeys, ...remainingKeys];
}

/** Recursively sort object keys for deterministic output. */
function sortKeys(obj: unknown): unknown {
	if (Array.isArray(obj)) return obj.map(sortKeys);
	if (!isRecord(obj)) return obj;

	const sorted: Record<string, unknown> = {};
	for (const key of sortObjectKeys(obj)) {
		sorted[key] = sortKeys(obj[key]);
	}
	return sorted;
}

function writeSchema(name: string, schema: unknown): void {
	const filePath = resolve(outDir, name + ".schema.json");
	writeFileSync(filePath, JSON.stringify(sortKeys(schema), null, "\t") + "\n");
	console.log("Generated " + name + ".schema.json");
}

mkdirSync(outDir, { recursive: true });
writeSchema("library", librarySchema);
writeSchema("program", programSchema);
