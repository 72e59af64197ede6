/**
 * Graceful shutdown and child process tracking.
 *
 * The CLI exec adapter registers child processes here.
 * bin.ts calls setupGracefulShutdown() at startup so that SIGINT / SIGTERM
 * are forwarded to a running gcloud before the CLI exits.
 */

import { constants } from "os";
import type { ChildProcess } from "child_process";

const activeChildren = new Set<ChildProcess>();

const SIGNAL_NUMBERS: { readonly [name: string]: number | undefined } = { ...constants.signals };

/**
 * Register a child process for cleanup on exit.
 * Automatically unregisters when the child closes or errors.
 */
export function trackChild(child: ChildProcess): void {
  activeChildren.add(child);
  const remove = () => activeChildren.delete(child);
  child.on("close", remove);
  child.on("error", remove);
}

/**
 * Exit status a shell would report for a child that exited with `code`
 * or was killed by `signal`.
 */
export function exitStatusOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
  return 1;
}

/** Send `signal` to every tracked child, then exit with `exitCode`. */
export function forwardSignal(
  signal: NodeJS.Signals,
  exitCode: number,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  for (const child of activeChildren) {
    child.kill(signal);
  }
  exit(exitCode);
}

/**
 * Install SIGINT and SIGTERM handlers that forward the signal
 * to tracked child processes before exiting.
 * Returns a function that removes the handlers again.
 */
export function setupGracefulShutdown(
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  const onSigint = () => forwardSignal("SIGINT", 130, exit);
  const onSigterm = () => forwardSignal("SIGTERM", 143, exit);

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return () => {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };
}
