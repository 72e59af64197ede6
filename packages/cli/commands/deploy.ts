/**
 * fndeploy deploy — Deploy the function with gcloud functions deploy
 *
 * This command wraps the platform-agnostic deployTool with the CLI adapter.
 */

import { deployTool, createCLIAdapter, type DeployOptions } from "../tools";

export async function deployCommand(opts: DeployOptions): Promise<number> {
  return deployTool(createCLIAdapter(), opts);
}
