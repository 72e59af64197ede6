/**
 * fndeploy init — Write an fndeploy.yaml scaffold
 *
 * This command wraps the platform-agnostic initTool with the CLI adapter.
 */

import { initTool, createCLIAdapter, type InitOptions } from "../tools";

export async function initCommand(opts: InitOptions): Promise<number> {
  return initTool(createCLIAdapter(), opts);
}
