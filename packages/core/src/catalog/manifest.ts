/**
 * Entity manifest loading
 *
 * A manifest is a JSON file listing entity declarations. Runtime
 * constructors are named, and only the built-in constructors below may be
 * named; application classes are declared from code.
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";
import type {
  EntityDeclaration,
  EntityKind,
  RuntimeConstructor,
  TypeParameterDeclaration,
} from "./types.js";

export const RUNTIME_CONSTRUCTORS: ReadonlyMap<string, RuntimeConstructor> =
  new Map<string, RuntimeConstructor>([
    ["Object", Object],
    ["String", String],
    ["Number", Number],
    ["Boolean", Boolean],
    ["Array", Array],
    ["Set", Set],
    ["Map", Map],
  ]);

export const STANDARD_MANIFEST_PATH = fileURLToPath(
  new URL("./standard-entities.json", import.meta.url)
);

const invalid = (message: string): Result<never, Diagnostic> =>
  error(createDiagnostic("GEN9006", "error", message));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

const parseTypeParameter = (
  value: unknown,
  where: string
): Result<TypeParameterDeclaration, Diagnostic> => {
  if (typeof value === "string") return ok(value);
  if (isRecord(value) && typeof value.name === "string") {
    const bounds = value.bounds;
    if (bounds !== undefined && !isStringArray(bounds)) {
      return invalid(`${where}: 'bounds' must be an array of strings`);
    }
    return ok({ name: value.name, bounds });
  }
  return invalid(`${where}: type parameter must be a string or { name }`);
};

const parseEntity = (
  value: unknown,
  index: number
): Result<EntityDeclaration, Diagnostic> => {
  const where = `entities[${index}]`;
  if (!isRecord(value)) {
    return invalid(`${where}: must be an object`);
  }

  const { id, kind, typeParameters, runtime } = value;
  if (typeof id !== "string" || id.length === 0) {
    return invalid(`${where}: missing or invalid 'id'`);
  }

  let entityKind: EntityKind = "class";
  if (kind === "interface") {
    entityKind = "interface";
  } else if (kind !== undefined && kind !== "class") {
    return invalid(`${where} (${id}): 'kind' must be "class" or "interface"`);
  }

  const superText = value.extends;
  if (superText !== undefined && typeof superText !== "string") {
    return invalid(`${where} (${id}): 'extends' must be a string`);
  }
  const interfaceTexts = value.implements;
  if (interfaceTexts !== undefined && !isStringArray(interfaceTexts)) {
    return invalid(`${where} (${id}): 'implements' must be an array of strings`);
  }

  let runtimeConstructor: RuntimeConstructor | undefined;
  if (runtime !== undefined) {
    runtimeConstructor =
      typeof runtime === "string" ? RUNTIME_CONSTRUCTORS.get(runtime) : undefined;
    if (!runtimeConstructor) {
      return invalid(
        `${where} (${id}): unknown runtime constructor '${String(runtime)}'`
      );
    }
  }

  const params: TypeParameterDeclaration[] = [];
  if (typeParameters !== undefined) {
    if (!Array.isArray(typeParameters)) {
      return invalid(`${where} (${id}): 'typeParameters' must be an array`);
    }
    for (const raw of typeParameters) {
      const parsed = parseTypeParameter(raw, `${where} (${id})`);
      if (!parsed.ok) return parsed;
      params.push(parsed.value);
    }
  }

  return ok({
    id,
    kind: entityKind,
    typeParameters: params,
    extends: superText,
    implements: interfaceTexts,
    runtime: runtimeConstructor,
  });
};

/**
 * Validate an already-parsed manifest document.
 */
export const parseEntityManifest = (
  document: unknown
): Result<readonly EntityDeclaration[], Diagnostic> => {
  if (!isRecord(document)) {
    return error(
      createDiagnostic("GEN9004", "error", "Entity manifest must be an object")
    );
  }
  const entities = document.entities;
  if (!Array.isArray(entities)) {
    return error(
      createDiagnostic(
        "GEN9005",
        "error",
        "Entity manifest: missing or invalid 'entities' array"
      )
    );
  }

  const declarations: EntityDeclaration[] = [];
  for (let i = 0; i < entities.length; i++) {
    const parsed = parseEntity(entities[i], i);
    if (!parsed.ok) return parsed;
    declarations.push(parsed.value);
  }
  return ok(declarations);
};

/**
 * Load and validate a manifest file.
 */
export const loadEntityManifest = (
  manifestPath: string
): Result<readonly EntityDeclaration[], Diagnostic> => {
  if (!existsSync(manifestPath)) {
    return error(
      createDiagnostic(
        "GEN9001",
        "error",
        `Entity manifest not found: ${manifestPath}`
      )
    );
  }

  let content: string;
  try {
    content = readFileSync(manifestPath, "utf-8");
  } catch (err) {
    return error(
      createDiagnostic(
        "GEN9002",
        "error",
        `Failed to read entity manifest: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    return error(
      createDiagnostic(
        "GEN9003",
        "error",
        `Invalid JSON in entity manifest ${manifestPath}: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }

  return parseEntityManifest(document);
};
