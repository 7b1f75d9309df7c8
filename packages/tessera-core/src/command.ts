/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Commands: generated shell scripts with a build/execute/terminate lifecycle.
 *
 * ```
 * building ──build()──▶ ready ──execute()──▶ executing ──▶ completed
 *                                               │
 *                                          terminate()
 *                                               ▼
 *                                           terminated
 * (any state) ──close()──▶ closed
 * ```
 */

import { spawn, type ChildProcess } from 'child_process';
import type { CommandCategory, CommandState, ExportContext, PipelineStore } from '@tessera/types';
import { Archive } from './archive.js';
import type { ArchiveMode } from './archiveFile.js';
import { ProcessError } from './errors.js';
import { parseFlag } from './links.js';

/** Template sections written when a command is built, in order */
export const COMMAND_SECTIONS = ['begin', 'middle', 'end'] as const;

export interface CommandInit {
  /** Pipeline path of the command panel */
  template: string;
  category: CommandCategory;
  /** Script directory, relative to the context's root path */
  path: string;
  /** Script name without extension */
  name: string;
  /** Leave the script in `building` until it is executed */
  delayBuild?: boolean;
  mode?: ArchiveMode;
}

export interface CommandExecuteOptions {
  /** Do not wait for the process to exit */
  interactive?: boolean;
  /** Terminates the running process when aborted */
  signal?: AbortSignal;
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
}

export class Command {
  private stateValue: CommandState;
  private child: ChildProcess | null = null;
  private exitCodeValue: number | null = null;

  private constructor(
    readonly script: Archive,
    readonly category: CommandCategory,
    initialState: CommandState
  ) {
    this.stateValue = initialState;
  }

  /**
   * Create the script file of a command panel.
   *
   * The panel's `extension` attribute is appended to the name and its
   * `regexes` rule set registered. Unless `delayBuild` is set the script is
   * built and closed immediately.
   *
   * @throws {IOError} If the script cannot be opened or written
   * @throws {ResolutionError} If a template token cannot be resolved
   */
  static async create(store: PipelineStore, context: ExportContext, init: CommandInit): Promise<Command> {
    const extension = store.getAttribute(context, init.template, 'extension', { resolve: true, default: '' });
    const script = Archive.create(store, context, {
      role: 'command',
      template: init.template,
      path: init.path,
      name: `${init.name}${extension}`,
    });
    script.addRegexRule(`${init.template}/regexes`);
    await script.open({ executable: true, mode: init.mode ?? 'w' });

    const command = new Command(script, init.category, 'building');
    if (!init.delayBuild) {
      try {
        await command.build();
      } catch (err) {
        await command.close();
        throw err;
      }
    }
    return command;
  }

  get name(): string {
    return this.script.name;
  }

  get template(): string {
    return this.script.template;
  }

  get state(): CommandState {
    return this.stateValue;
  }

  /** Exit code of the last run (null if not run or not waited for) */
  get exitCode(): number | null {
    return this.exitCodeValue;
  }

  /** Launcher line that runs this script from the export root */
  get invocation(): string {
    const dir = this.script.path.replace(/\/+$/, '');
    return dir && dir !== '.' ? `${dir}/${this.name}` : `./${this.name}`;
  }

  /**
   * Write the `begin`, `middle` and `end` sections and close the script.
   * Does nothing unless the command is `building`.
   */
  async build(): Promise<void> {
    if (this.stateValue !== 'building') return;
    for (const section of COMMAND_SECTIONS) {
      await this.script.build(section);
    }
    await this.script.close();
    this.stateValue = 'ready';
  }

  /**
   * Run the script.
   *
   * The panel's `execute` attribute (default True) decides whether a
   * process is spawned at all. Non-interactive runs wait for the process;
   * aborting `signal` terminates it and leaves the command `terminated`
   * without applying target regexes. A command whose process cannot be
   * spawned goes back to `ready`.
   *
   * @throws {ProcessError} If the process cannot be spawned
   */
  async execute(options: CommandExecuteOptions = {}): Promise<CommandState> {
    if (this.stateValue === 'closed') {
      throw new ProcessError(this.name, 'is closed');
    }
    await this.build();
    await this.script.close();

    const context = this.script.context;
    const shouldExecute = parseFlag(
      this.script.store.getAttribute(context, this.template, 'execute', { resolve: true, default: 'True' }),
      `'execute' attribute of ${this.template}`
    );
    if (!shouldExecute) {
      this.stateValue = 'completed';
      return this.stateValue;
    }

    // New process group so terminate() reaches everything the script starts
    const child = spawn(this.invocation, {
      cwd: context.rootPath,
      shell: true,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.child = child;
    this.exitCodeValue = null;
    this.stateValue = 'executing';

    // Listeners go on before any await so a fast exit is not missed
    const resultPromise = new Promise<{ exitCode: number | null; error: string | null }>((resolve) => {
      child.on('error', (err) => {
        resolve({ exitCode: null, error: `failed to spawn: ${err.message}` });
      });

      child.on('close', (code) => {
        resolve({ exitCode: code, error: null });
      });
    });

    child.stdout?.on('data', (data: Buffer) => {
      options.onStdout?.(data.toString('utf-8'));
    });
    child.stderr?.on('data', (data: Buffer) => {
      options.onStderr?.(data.toString('utf-8'));
    });

    if (options.interactive) {
      void resultPromise.then((result) => {
        if (result.error !== null) {
          console.warn(`Command '${this.name}' ${result.error}`);
        }
        this.exitCodeValue = result.exitCode;
        this.child = null;
        if (this.stateValue === 'executing') this.stateValue = 'completed';
      });
      return this.stateValue;
    }

    const onAbort = () => {
      this.terminate();
    };
    const signal = options.signal;
    if (signal) {
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    let result: { exitCode: number | null; error: string | null };
    try {
      result = await resultPromise;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.child = null;
    }

    if (result.error !== null) {
      // Nothing ran: the built script can be executed again
      if (this.stateValue === 'executing') this.stateValue = 'ready';
      throw new ProcessError(this.name, result.error);
    }

    this.exitCodeValue = result.exitCode;
    if (this.state === 'terminated') {
      return this.stateValue;
    }

    try {
      await this.script.applyTargetRegexes({ signal });
    } finally {
      this.stateValue = 'completed';
    }
    return this.stateValue;
  }

  /**
   * Send SIGTERM to the running process group, falling back to the single
   * process. The command becomes `terminated`.
   *
   * @returns Whether a signal was delivered
   */
  terminate(): boolean {
    const child = this.child;
    if (!child || child.exitCode !== null || child.signalCode !== null) {
      return false;
    }
    this.stateValue = 'terminated';

    if (child.pid !== undefined) {
      try {
        process.kill(-child.pid, 'SIGTERM');
        return true;
      } catch {
        // No process group (or it already exited): signal the process itself
        return child.kill('SIGTERM');
      }
    }
    return child.kill('SIGTERM');
  }

  /**
   * Close the script and terminate any running process. Safe to call
   * multiple times.
   */
  async close(): Promise<void> {
    if (this.stateValue === 'closed') return;
    this.terminate();
    this.stateValue = 'closed';
    await this.script.close();
  }
}
