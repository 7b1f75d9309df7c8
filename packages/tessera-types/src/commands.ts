/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Command categories and lifecycle states.
 */

/**
 * Command categories in execution order.
 *
 * Commands of an earlier category always run before any command of a later
 * one (textures are optimised and shaders compiled before rendering).
 */
export const CommandCategories = ['OPTIMIZE', 'COMPILE', 'INFO', 'RENDER', 'POSTRENDER'] as const;

export type CommandCategory = (typeof CommandCategories)[number];

export function isCommandCategory(value: string): value is CommandCategory {
  return (CommandCategories as readonly string[]).includes(value);
}

/**
 * Lifecycle state of a command.
 *
 * ```
 * building ──build()──▶ ready ──execute()──▶ executing ──▶ completed
 *                                                     └──▶ terminated
 * any ──close()──▶ closed
 * ```
 *
 * - `building`: script text generation deferred until execution
 * - `ready`: script written and closed
 * - `executing`: child process running
 * - `completed`: process exited on its own (or execution was skipped)
 * - `terminated`: process was killed by a cancellation
 * - `closed`: terminal, handles released
 */
export type CommandState =
  | 'building'
  | 'ready'
  | 'executing'
  | 'completed'
  | 'terminated'
  | 'closed';
