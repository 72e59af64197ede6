/**
 * CLI Runtime Adapter
 *
 * Implements RuntimeAdapter for terminal usage
 * using @clack/prompts for output and child_process for execution.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { spawn, spawnSync } from "child_process";
import { exitStatusOf, trackChild } from "../lib/process";
import type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  LogAdapter,
  StreamOptions,
} from "./types";

/** Shell-compatible statuses for a command that could not be started */
const COMMAND_NOT_FOUND = 127;
const COMMAND_NOT_EXECUTABLE = 126;

// ============================================================================
// Execution Adapter Implementation
// ============================================================================

class CLIExecAdapter implements ExecAdapter {
  stream(command: string, args: readonly string[] = [], options?: StreamOptions): Promise<number> {
    return new Promise((resolve) => {
      let settled = false;
      const settle = (status: number) => {
        if (settled) return;
        settled = true;
        resolve(status);
      };

      const child = spawn(command, args, {
        cwd: options?.cwd,
        stdio: "inherit",
        shell: false,
      });
      trackChild(child);
      child.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") settle(COMMAND_NOT_FOUND);
        else if (err.code === "EACCES") settle(COMMAND_NOT_EXECUTABLE);
        else settle(1);
      });
      child.on("close", (code, signal) => settle(exitStatusOf(code, signal)));
    });
  }

  commandExists(command: string): boolean {
    // `command -v` is a shell builtin; the name goes in as $1, never into the script
    const result =
      process.platform === "win32"
        ? spawnSync("where", [command], { stdio: "ignore" })
        : spawnSync("/bin/sh", ["-c", 'command -v "$1"', "sh", command], { stdio: "ignore" });
    return result.status === 0;
  }
}

// ============================================================================
// UI Adapter Implementation
// ============================================================================

class CLIUIAdapter implements UIAdapter {
  intro(message: string): void {
    console.log();
    p.intro(pc.bgCyan(pc.black(` ${message} `)));
  }

  note(content: string, title?: string): void {
    p.note(content, title);
  }

  outro(message: string): void {
    p.outro(message);
  }

  log: LogAdapter = {
    info(message: string): void {
      p.log.info(message);
    },
    step(message: string): void {
      p.log.step(message);
    },
    success(message: string): void {
      p.log.success(message);
    },
    warn(message: string): void {
      p.log.warn(message);
    },
    error(message: string): void {
      p.log.error(message);
    },
  };
}

// ============================================================================
// Runtime Adapter
// ============================================================================

/**
 * Create a CLI runtime adapter for terminal usage
 */
export function createCLIAdapter(): RuntimeAdapter {
  return {
    ui: new CLIUIAdapter(),
    exec: new CLIExecAdapter(),
  };
}
