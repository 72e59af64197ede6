/**
 * Deploy Tool — Deploy a storage-triggered function with gcloud
 *
 * Platform-agnostic implementation using RuntimeAdapter.
 */

import type { RuntimeAdapter, ToolImplementation } from "../adapters";
import { loadDescriptor } from "../lib/config";
import {
  DEPLOY_COMMAND,
  buildDeployArgs,
  formatCommandLine,
  isDeprecatedRuntime,
} from "@fndeploy/core";
import type { FunctionDescriptor } from "@fndeploy/core";
import pc from "picocolors";

/** Shell status for a command that is not on PATH */
const COMMAND_NOT_FOUND = 127;

export interface DeployOptions {
  /** Function to deploy (defaults to the manifest's only function, or the built-in one) */
  name?: string;
  /** Override the runtime tag */
  runtime?: string;
  /** Directory to resolve fndeploy.yaml from (defaults to process.cwd()) */
  cwd?: string;
}

/**
 * Deploy tool implementation.
 * Resolves to gcloud's exit status; gcloud runs exactly once and its
 * diagnostics are the only output on failure.
 */
export const deployTool: ToolImplementation<DeployOptions> = async (
  runtime: RuntimeAdapter,
  options: DeployOptions
) => {
  const { ui, exec } = runtime;

  ui.intro("fndeploy");

  const resolved = loadDescriptor(options.name, options.cwd);
  if (!resolved.ok) {
    ui.log.error(resolved.error);
    return 1;
  }

  let descriptor: FunctionDescriptor = resolved.value.descriptor;
  if (options.runtime !== undefined) {
    if (!/\S/.test(options.runtime)) {
      ui.log.error("--runtime must not be empty");
      return 1;
    }
    descriptor = { ...descriptor, runtime: options.runtime };
  }

  if (isDeprecatedRuntime(descriptor.runtime)) {
    ui.log.warn(
      `Runtime ${pc.bold(descriptor.runtime)} is no longer supported by Cloud Functions. ` +
        `Update "runtime" in fndeploy.yaml or pass ${pc.cyan("--runtime <tag>")}.`
    );
  }

  if (!exec.commandExists(DEPLOY_COMMAND)) {
    ui.log.error(
      `${DEPLOY_COMMAND} not found on PATH. Install the Google Cloud CLI from https://cloud.google.com/sdk/docs/install`
    );
    return COMMAND_NOT_FOUND;
  }

  const args = buildDeployArgs(descriptor);
  ui.log.step(`Deploying ${pc.bold(descriptor.name)} (${resolved.value.origin})`);
  ui.log.info(formatCommandLine(DEPLOY_COMMAND, args));

  const exitCode = await exec.stream(DEPLOY_COMMAND, args, { cwd: options.cwd });
  if (exitCode !== 0) {
    return exitCode;
  }

  ui.outro(`Deployed ${descriptor.name}`);
  return 0;
};
