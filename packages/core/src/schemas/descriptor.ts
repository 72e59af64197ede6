/**
 * Zod schemas for deployment descriptors and the fndeploy.yaml manifest.
 * These are the source of truth — TypeScript types are derived via z.infer<>.
 */

import { z } from "zod";

/** A string with at least one non-whitespace character, kept exactly as written */
const requiredField = (field: string) =>
  z.string({ required_error: `${field} is required` }).regex(/\S/, `${field} must not be empty`);

/** Schema for a single function deployment */
export const FunctionDescriptorSchema = z.object({
  /** Name the function is registered under (e.g., "ack-fits-received") */
  name: requiredField("name"),
  /** Symbol invoked when the function runs */
  entryPoint: requiredField("entryPoint"),
  /** Versioned runtime tag (e.g., "python312") */
  runtime: requiredField("runtime"),
  /** Bucket whose events trigger the function */
  triggerResource: requiredField("triggerResource"),
  /** Event type tag (e.g., "google.storage.object.finalize") */
  triggerEvent: requiredField("triggerEvent"),
  /** Source directory, passed as --source */
  source: requiredField("source").optional(),
  region: requiredField("region").optional(),
  project: requiredField("project").optional(),
}).strict();

/** Schema for the fndeploy.yaml manifest */
export const DeployManifestSchema = z
  .object({
    /** Default project for functions that do not set one */
    project: requiredField("project").optional(),
    /** Default region for functions that do not set one */
    region: requiredField("region").optional(),
    functions: z.array(FunctionDescriptorSchema).min(1, "At least one function is required"),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.functions.forEach((fn, i) => {
      if (seen.has(fn.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["functions", i, "name"],
          message: `Duplicate function name "${fn.name}"`,
        });
      }
      seen.add(fn.name);
    });
  });
