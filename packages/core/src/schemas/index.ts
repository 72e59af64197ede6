/**
 * Barrel export for all Zod schemas.
 */

export {
  FunctionDescriptorSchema,
  DeployManifestSchema,
} from "./descriptor";
