/**
 * Load/save fndeploy manifests and resolve the descriptor to deploy.
 *
 * A project may keep fndeploy.yaml at its root. Without one, the
 * built-in descriptor is deployed unchanged.
 */

import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import { DEFAULT_FUNCTION, MANIFEST_FILE, validateManifest } from "@fndeploy/core";
import type { DeployManifest, FunctionDescriptor, Result } from "@fndeploy/core";
import { findProjectRoot } from "./project";

/** A manifest together with the file it was read from */
export interface LoadedManifest {
  filePath: string;
  manifest: DeployManifest;
}

/** The descriptor chosen for a run and where it came from */
export interface ResolvedDescriptor {
  descriptor: FunctionDescriptor;
  /** Manifest path, or "built-in" */
  origin: string;
}

/**
 * Parse and validate manifest YAML.
 */
export function parseManifest(raw: string): Result<DeployManifest> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
  return validateManifest(parsed);
}

/**
 * Load the manifest from the project root.
 * Resolves to null when there is no fndeploy.yaml in `startDir` or any ancestor.
 */
export function loadManifest(startDir?: string): Result<LoadedManifest | null> {
  const projectRoot = findProjectRoot(startDir);
  if (projectRoot === null) return { ok: true, value: null };

  const filePath = path.join(projectRoot, MANIFEST_FILE);
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return { ok: false, error: `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}` };
  }
  const parsed = parseManifest(raw);
  if (!parsed.ok) {
    return { ok: false, error: `Invalid ${filePath}: ${parsed.error}` };
  }
  return { ok: true, value: { filePath, manifest: parsed.value } };
}

/**
 * Pick a function from the manifest and fill in the manifest-level
 * project and region where the function leaves them unset.
 */
export function resolveFunction(manifest: DeployManifest, name?: string): Result<FunctionDescriptor> {
  const names = manifest.functions.map((fn) => fn.name);
  let fn: DeployManifest["functions"][number] | undefined;

  if (name !== undefined) {
    fn = manifest.functions.find((f) => f.name === name);
    if (!fn) {
      return { ok: false, error: `Function "${name}" not found in ${MANIFEST_FILE}. Available: ${names.join(", ")}` };
    }
  } else if (manifest.functions.length === 1) {
    fn = manifest.functions[0];
  } else {
    return {
      ok: false,
      error: `${MANIFEST_FILE} defines ${names.length} functions; pass one of: ${names.join(", ")}`,
    };
  }

  const project = fn.project ?? manifest.project;
  const region = fn.region ?? manifest.region;
  return {
    ok: true,
    value: {
      ...fn,
      ...(project !== undefined ? { project } : {}),
      ...(region !== undefined ? { region } : {}),
    },
  };
}

/**
 * Resolve the descriptor for a run: from fndeploy.yaml when present,
 * otherwise the built-in descriptor.
 */
export function loadDescriptor(name?: string, startDir?: string): Result<ResolvedDescriptor> {
  const loaded = loadManifest(startDir);
  if (!loaded.ok) return loaded;

  if (loaded.value === null) {
    if (name !== undefined && name !== DEFAULT_FUNCTION.name) {
      return {
        ok: false,
        error: `No ${MANIFEST_FILE} found and "${name}" is not the built-in function (${DEFAULT_FUNCTION.name}).`,
      };
    }
    return { ok: true, value: { descriptor: DEFAULT_FUNCTION, origin: "built-in" } };
  }

  const resolved = resolveFunction(loaded.value.manifest, name);
  if (!resolved.ok) return resolved;
  return { ok: true, value: { descriptor: resolved.value, origin: loaded.value.filePath } };
}

/**
 * Save a manifest as `dir`/fndeploy.yaml. Returns the written path.
 */
export function saveManifest(dir: string, manifest: DeployManifest): string {
  const filePath = path.join(dir, MANIFEST_FILE);
  fs.writeFileSync(filePath, YAML.stringify(manifest), "utf-8");
  return filePath;
}
