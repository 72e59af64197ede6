/**
 * Schema validation for descriptors and manifests.
 * Uses Zod for runtime validation; issues are flattened into one message.
 */

import type { z } from "zod";
import { DeployManifestSchema, FunctionDescriptorSchema } from "./schemas";
import type { DeployManifest, FunctionDescriptor, Result } from "./types";

/** Render issues as `path: message`, joined by "; " */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

export function validateDescriptor(raw: unknown): Result<FunctionDescriptor> {
  const result = FunctionDescriptorSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: formatIssues(result.error.issues) };
}

export function validateManifest(raw: unknown): Result<DeployManifest> {
  const result = DeployManifestSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: formatIssues(result.error.issues) };
}
