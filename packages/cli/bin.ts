#!/usr/bin/env node

/**
 * fndeploy CLI — Entry point
 *
 * Deploys a storage-triggered cloud function through gcloud and exits
 * with gcloud's own status.
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import pkgJson from "./package.json";
import { setupGracefulShutdown } from "./lib/process";
import { deployCommand } from "./commands/deploy";
import { showCommand } from "./commands/show";
import { validateCommand } from "./commands/validate";
import { initCommand } from "./commands/init";

// Forward SIGINT/SIGTERM to gcloud before exiting
setupGracefulShutdown();

const program = new Command();

program
  .name("fndeploy")
  .description("Deploy a storage-triggered cloud function with gcloud")
  .version(pkgJson.version);

program
  .command("deploy")
  .description("Run gcloud functions deploy for a function")
  .argument("[name]", "Function to deploy (from fndeploy.yaml, or the built-in one)")
  .option("-r, --runtime <tag>", "Override the runtime tag")
  .action(async (name: string | undefined, opts: { runtime?: string }) => {
    process.exit(await deployCommand({ name, runtime: opts.runtime }));
  });

program
  .command("show")
  .description("Print the gcloud command without running it")
  .argument("[name]", "Function to show")
  .option("--json", "Print the resolved descriptor as JSON")
  .action(async (name: string | undefined, opts: { json?: boolean }) => {
    process.exit(await showCommand({ name, json: opts.json }));
  });

program
  .command("validate")
  .description("Validate fndeploy.yaml and list its functions")
  .action(async () => {
    process.exit(await validateCommand({}));
  });

program
  .command("init")
  .description("Write fndeploy.yaml with the built-in function")
  .option("-f, --force", "Overwrite an existing fndeploy.yaml")
  .action(async (opts: { force?: boolean }) => {
    process.exit(await initCommand({ force: opts.force }));
  });

program.parseAsync().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
