/**
 * Show Tool — Print the deploy command without running it
 */

import type { RuntimeAdapter, ToolImplementation } from "../adapters";
import { loadDescriptor } from "../lib/config";
import { DEPLOY_COMMAND, buildDeployArgs, formatCommandLine } from "@fndeploy/core";

export interface ShowOptions {
  name?: string;
  /** Print the resolved descriptor as JSON instead of a command line */
  json?: boolean;
  cwd?: string;
  /** Output sink, console.log by default */
  print?: (line: string) => void;
}

export const showTool: ToolImplementation<ShowOptions> = async (
  runtime: RuntimeAdapter,
  options: ShowOptions
) => {
  const print = options.print ?? ((line: string) => console.log(line));

  const resolved = loadDescriptor(options.name, options.cwd);
  if (!resolved.ok) {
    runtime.ui.log.error(resolved.error);
    return 1;
  }

  const { descriptor } = resolved.value;
  if (options.json) {
    print(JSON.stringify(descriptor, null, 2));
  } else {
    print(formatCommandLine(DEPLOY_COMMAND, buildDeployArgs(descriptor)));
  }
  return 0;
};
