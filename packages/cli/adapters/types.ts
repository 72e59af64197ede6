/**
 * Runtime Adapter Interfaces
 *
 * These interfaces define the contract between the core command logic
 * and the runtime environment. The CLI adapter talks to a real terminal
 * and spawns real processes; tests swap in a fake that records both.
 */

// ============================================================================
// Execution Types
// ============================================================================

/** Options for streaming command execution */
export interface StreamOptions {
  cwd?: string;
}

// ============================================================================
// UI Adapter
// ============================================================================

/** Logging interface */
export interface LogAdapter {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** User interface adapter for terminal output */
export interface UIAdapter {
  /** Show introductory banner/message */
  intro(message: string): void;

  /** Show a note/info box */
  note(content: string, title?: string): void;

  /** Show outro/closing message */
  outro(message: string): void;

  /** Logging methods */
  log: LogAdapter;
}

// ============================================================================
// Execution Adapter
// ============================================================================

/** Command execution adapter */
export interface ExecAdapter {
  /**
   * Run a command with inherited stdio and wait for it to exit.
   * Arguments are passed to the process as-is, without a shell.
   * Resolves to the exit code (128 + signal number when killed by a signal).
   */
  stream(command: string, args?: readonly string[], options?: StreamOptions): Promise<number>;

  /** Check if a command exists on the system PATH */
  commandExists(command: string): boolean;
}

// ============================================================================
// Runtime Adapter
// ============================================================================

/** Combined runtime adapter providing all platform abstractions */
export interface RuntimeAdapter {
  /** User interface adapter */
  ui: UIAdapter;

  /** Command execution adapter */
  exec: ExecAdapter;
}

// ============================================================================
// Tool Implementation
// ============================================================================

/**
 * A tool implementation performs a command action using the provided
 * runtime adapter and resolves to the exit status for the process.
 *
 * @example
 * const showTool: ToolImplementation<ShowOptions> = async (runtime, options) => {
 *   runtime.ui.log.info("Resolving descriptor...");
 *   return 0;
 * };
 */
export type ToolImplementation<TOptions = Record<string, unknown>> = (
  runtime: RuntimeAdapter,
  options: TOptions
) => Promise<number>;
