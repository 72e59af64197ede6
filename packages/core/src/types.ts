/**
 * Shared type definitions for fndeploy.
 * Types are derived from Zod schemas — the schemas are the source of truth.
 */

import type { z } from "zod";
import type { FunctionDescriptorSchema, DeployManifestSchema } from "./schemas";

/** A single function deployment. Never mutated once built. */
export type FunctionDescriptor = Readonly<z.infer<typeof FunctionDescriptorSchema>>;

/** The fndeploy.yaml manifest */
export type DeployManifest = z.infer<typeof DeployManifestSchema>;

/**
 * Discriminated union for fallible operations that return a value on success.
 * After narrowing with `if (result.ok)`, `result.value` is typed as `T`.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };
