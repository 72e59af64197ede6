/**
 * Init Tool — Write an fndeploy.yaml scaffold holding the built-in function
 */

import * as fs from "fs";
import * as path from "path";
import type { RuntimeAdapter, ToolImplementation } from "../adapters";
import { saveManifest } from "../lib/config";
import { DEFAULT_FUNCTION, MANIFEST_FILE } from "@fndeploy/core";

export interface InitOptions {
  /** Overwrite an existing manifest */
  force?: boolean;
  /** Directory to write into (defaults to process.cwd()) */
  cwd?: string;
}

export const initTool: ToolImplementation<InitOptions> = async (
  runtime: RuntimeAdapter,
  options: InitOptions
) => {
  const { ui } = runtime;
  const dir = options.cwd ?? process.cwd();

  if (fs.existsSync(path.join(dir, MANIFEST_FILE)) && !options.force) {
    ui.log.error(`${MANIFEST_FILE} already exists in ${dir}. Pass --force to overwrite it.`);
    return 1;
  }

  const filePath = saveManifest(dir, { functions: [{ ...DEFAULT_FUNCTION }] });
  ui.log.success(`Wrote ${filePath}`);
  return 0;
};
