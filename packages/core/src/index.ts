/**
 * @fndeploy/core — descriptor schemas, constants, and command composition
 */

// Types
export type {
  DeployManifest,
  FunctionDescriptor,
  Result,
} from "./types";

// Schemas
export { DeployManifestSchema, FunctionDescriptorSchema } from "./schemas";

// Constants
export {
  DEFAULT_FUNCTION,
  DEPLOY_COMMAND,
  DEPRECATED_RUNTIMES,
  MANIFEST_FILE,
  OBJECT_FINALIZE_EVENT,
  isDeprecatedRuntime,
} from "./constants";

// Command composition
export {
  buildDeployArgs,
  formatCommandLine,
  shellQuote,
} from "./command";

// Validation
export { formatIssues, validateDescriptor, validateManifest } from "./validate";
