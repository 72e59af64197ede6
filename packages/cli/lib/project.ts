/**
 * Project root detection for fndeploy manifests.
 *
 * Walks up from the working directory looking for fndeploy.yaml.
 * Without one, the CLI deploys the built-in descriptor.
 */

import * as fs from "fs";
import * as path from "path";
import { MANIFEST_FILE } from "@fndeploy/core";

/**
 * Walk up from `startDir` looking for a directory that contains MANIFEST_FILE.
 * Returns the directory path if found, or null if the filesystem root is reached.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(dir, MANIFEST_FILE))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}
