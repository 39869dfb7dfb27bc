/**
 * Output Port
 *
 * Everything a pipeline shows the user goes through this interface, so the
 * same snapshot and restore logic can drive a Clack terminal UI, plain piped
 * output, or a recording fake in tests.
 */

/**
 * Progress indicator for a single long-running step.
 */
export interface OutputSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
}

export interface OutputPort {
  /** Per-package progress, such as a restore decision */
  info(message: string): void;

  /** Start of a phase */
  step(message: string): void;

  success(message: string): void;

  warn(message: string): void;

  /** Multi-line block (a snapshot table, the effective config) */
  note(content: string, title?: string): void;

  /**
   * Ask a yes/no question. Outputs without a user to ask answer `initial`.
   */
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;

  spinner(): OutputSpinner;
}
