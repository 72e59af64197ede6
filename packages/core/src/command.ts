/**
 * Composition of the gcloud deploy invocation from a descriptor.
 */

import type { FunctionDescriptor } from "./types";

/**
 * Build the argument list for `gcloud functions deploy`.
 * Values are passed through verbatim; optional flags follow the trigger flags.
 */
export function buildDeployArgs(descriptor: FunctionDescriptor): string[] {
  const args = [
    "functions",
    "deploy",
    descriptor.name,
    "--entry-point",
    descriptor.entryPoint,
    "--runtime",
    descriptor.runtime,
    "--trigger-resource",
    descriptor.triggerResource,
    "--trigger-event",
    descriptor.triggerEvent,
  ];
  if (descriptor.source !== undefined) args.push("--source", descriptor.source);
  if (descriptor.region !== undefined) args.push("--region", descriptor.region);
  if (descriptor.project !== undefined) args.push("--project", descriptor.project);
  return args;
}

const SAFE_ARG = /^[A-Za-z0-9_\-.,:/@=+%]+$/;

/** Quote a single argument for a POSIX shell */
export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command and its arguments as one copy-pasteable shell line.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(shellQuote).join(" ");
}
