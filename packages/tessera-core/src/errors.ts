/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Domain error types for tessera-core.
 *
 * All Tessera errors extend TesseraError, allowing callers to catch all domain
 * errors with `if (err instanceof TesseraError)` or specific errors with their
 * class.
 */

import type { CommandCategory, CommandState } from '@tessera/types';

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all Tessera errors */
export class TesseraError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Template Errors
// =============================================================================

/**
 * Thrown when a token cannot be resolved.
 *
 * Unresolved tokens are never replaced by empty text, since that would
 * silently produce broken scripts.
 */
export class ResolutionError extends TesseraError {
  constructor(
    public readonly path: string,
    public readonly origin: string,
    public readonly reason: string = 'cannot be resolved'
  ) {
    super(`Token '${path}' in ${origin} ${reason}`);
  }
}

/**
 * Thrown when a pipeline or scene document is malformed.
 */
export class DocumentError extends TesseraError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Invalid document '${path}': ${reason}`);
  }
}

// =============================================================================
// Filesystem Errors
// =============================================================================

/**
 * Thrown when an archive cannot be opened, read, written or closed.
 */
export class IOError extends TesseraError {
  constructor(
    public readonly operation: string,
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(
      cause
        ? `Cannot ${operation} '${path}': ${cause.message}`
        : `Cannot ${operation} '${path}'`
    );
  }
}

/**
 * Thrown when the export directory tree cannot be prepared.
 */
export class DirectoryError extends TesseraError {
  constructor(
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(
      cause
        ? `Could not prepare export directory '${path}': ${cause.message}`
        : `Could not prepare export directory '${path}'`
    );
  }
}

/**
 * Thrown when exporting a project with unsaved changes.
 *
 * Relative export paths resolve against the saved project file, so an
 * export needs a project that is on disk and unmodified.
 */
export class DirtyStateError extends TesseraError {
  constructor(public readonly projectPath: string = '') {
    super('Project must be saved before it can be exported');
  }
}

// =============================================================================
// Process Errors
// =============================================================================

/**
 * Thrown when a command script cannot be spawned, or exits non-zero while
 * the caller asked to stop on failures.
 */
export class ProcessError extends TesseraError {
  constructor(
    public readonly command: string,
    public readonly reason: string,
    public readonly exitCode?: number | null
  ) {
    super(`Command '${command}' ${reason}`);
  }
}

// =============================================================================
// Export Errors
// =============================================================================

/**
 * Wraps a failure while building one export unit (a pass archive or a
 * command) with the identity of that unit.
 */
export class ExportError extends TesseraError {
  constructor(
    public readonly unit: string,
    public readonly template: string,
    public readonly cause: Error
  ) {
    super(
      template
        ? `Failed to build ${unit} from '${template}': ${cause.message}`
        : `Failed to build ${unit}: ${cause.message}`
    );
  }
}

/**
 * Outcome of one command in an `executeCommands` run.
 */
export interface CommandExecutionResult {
  /** Script file name */
  name: string;
  category: CommandCategory;
  /** Final state of the command */
  state: CommandState;
  /** Whether the category was enabled for execution */
  executed: boolean;
  /** Exit code (null when not waited for) */
  exitCode: number | null;
  /** Execution time in ms */
  duration: number;
}

/**
 * Thrown when command execution is aborted via AbortSignal.
 *
 * This is not an error condition - it indicates the run was intentionally
 * cancelled. The partial results contain every command handled before and
 * including the terminated one. The terminated command stays queued.
 */
export class ExportAbortedError extends TesseraError {
  constructor(public readonly partialResults: CommandExecutionResult[] = []) {
    super('Command execution was aborted');
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT'
  );
}

/** Check if error is ENOTEMPTY (directory not empty) */
export function isNotEmptyError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = (err as NodeJS.ErrnoException).code;
  return code === 'ENOTEMPTY' || code === 'EEXIST';
}

/** Normalize an unknown thrown value to an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
