/**
 * Minimal logging contract used across the orchestrator. A pino or
 * console-like logger satisfies this interface out of the box.
 */
export interface LoggerLike {
  debug?(payload?: unknown, message?: string): void;
  info?(payload?: unknown, message?: string): void;
  warn?(payload?: unknown, message?: string): void;
  error?(payload?: unknown, message?: string): void;
}
