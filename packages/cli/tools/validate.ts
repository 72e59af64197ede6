/**
 * Validate Tool — Check fndeploy.yaml and list what would be deployed
 *
 * Platform-agnostic implementation using RuntimeAdapter.
 */

import type { RuntimeAdapter, ToolImplementation } from "../adapters";
import { loadManifest, resolveFunction } from "../lib/config";
import { DEFAULT_FUNCTION, MANIFEST_FILE, isDeprecatedRuntime } from "@fndeploy/core";
import type { FunctionDescriptor } from "@fndeploy/core";
import pc from "picocolors";

export interface ValidateOptions {
  cwd?: string;
}

function describeFunction(descriptor: FunctionDescriptor): string {
  const lines = [
    `Entry point: ${descriptor.entryPoint}`,
    `Runtime:     ${descriptor.runtime}`,
    `Trigger:     ${descriptor.triggerEvent} on ${descriptor.triggerResource}`,
  ];
  if (descriptor.source) lines.push(`Source:      ${descriptor.source}`);
  if (descriptor.region) lines.push(`Region:      ${descriptor.region}`);
  if (descriptor.project) lines.push(`Project:     ${descriptor.project}`);
  return lines.join("\n");
}

export const validateTool: ToolImplementation<ValidateOptions> = async (
  runtime: RuntimeAdapter,
  options: ValidateOptions
) => {
  const { ui } = runtime;

  const loaded = loadManifest(options.cwd);
  if (!loaded.ok) {
    ui.log.error(loaded.error);
    return 1;
  }

  const descriptors: FunctionDescriptor[] = [];
  if (loaded.value === null) {
    ui.log.info(`No ${MANIFEST_FILE} found; the built-in function will be deployed.`);
    descriptors.push(DEFAULT_FUNCTION);
  } else {
    const { manifest } = loaded.value;
    for (const fn of manifest.functions) {
      const resolved = resolveFunction(manifest, fn.name);
      if (!resolved.ok) {
        ui.log.error(resolved.error);
        return 1;
      }
      descriptors.push(resolved.value);
    }
  }

  for (const descriptor of descriptors) {
    ui.note(describeFunction(descriptor), descriptor.name);
    if (isDeprecatedRuntime(descriptor.runtime)) {
      ui.log.warn(`${descriptor.name}: runtime ${pc.bold(descriptor.runtime)} is no longer supported by Cloud Functions.`);
    }
  }

  ui.log.success(`${descriptors.length} function(s) valid`);
  return 0;
};
