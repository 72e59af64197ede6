/**
 * Tools Module
 *
 * Platform-agnostic tool implementations using the RuntimeAdapter pattern.
 * Each tool resolves to the exit status the CLI should exit with.
 *
 * @example
 * import { deployTool, createCLIAdapter } from './tools';
 *
 * process.exit(await deployTool(createCLIAdapter(), {}));
 */

export { deployTool, type DeployOptions } from "./deploy";
export { showTool, type ShowOptions } from "./show";
export { validateTool, type ValidateOptions } from "./validate";
export { initTool, type InitOptions } from "./init";

// Re-export adapter types and factory for convenience
export {
  type RuntimeAdapter,
  type ToolImplementation,
  createCLIAdapter,
} from "../adapters";
