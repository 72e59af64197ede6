/**
 * fndeploy show — Print the deploy command without running it
 *
 * This command wraps the platform-agnostic showTool with the CLI adapter.
 */

import { showTool, createCLIAdapter, type ShowOptions } from "../tools";

export async function showCommand(opts: ShowOptions): Promise<number> {
  return showTool(createCLIAdapter(), opts);
}
