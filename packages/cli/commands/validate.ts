/**
 * fndeploy validate — Check fndeploy.yaml and list what would be deployed
 *
 * This command wraps the platform-agnostic validateTool with the CLI adapter.
 */

import { validateTool, createCLIAdapter, type ValidateOptions } from "../tools";

export async function validateCommand(opts: ValidateOptions): Promise<number> {
  return validateTool(createCLIAdapter(), opts);
}
