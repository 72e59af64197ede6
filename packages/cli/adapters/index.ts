/**
 * Runtime Adapters Module
 *
 * Provides platform-agnostic abstractions for output and execution,
 * so the same tool logic runs against a terminal or a test double.
 *
 * @example
 * import { createCLIAdapter } from './adapters';
 * import { deployTool } from './tools';
 *
 * const status = await deployTool(createCLIAdapter(), {});
 * process.exit(status);
 */

// Export types
export type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  LogAdapter,
  StreamOptions,
  ToolImplementation,
} from "./types";

// Export CLI adapter
export { createCLIAdapter } from "./cli-adapter";
