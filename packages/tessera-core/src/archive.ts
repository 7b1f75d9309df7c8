/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Archives: generated files written from pipeline templates.
 *
 * A root archive owns one physical file. Composed archives are additional
 * logical writers onto the same file: they share the root's handle, flags and
 * regex rule lists, but only the root may close the file.
 *
 * Regex rules come from `regexes` elements of templates:
 * - rule sets without a `target` attribute rewrite this archive when the root
 *   closes it;
 * - rule sets with a `target` are deferred and rewrite the matching files
 *   when `applyTargetRegexes()` runs (e.g. after a command produced them).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { deriveContext, type ExportContext, type PipelineStore } from '@tessera/types';
import { ArchiveFile, type ArchiveMode } from './archiveFile.js';
import { IOError, toError } from './errors.js';
import { parseFlag } from './links.js';
import { applyRegexRule, parseMatchCount } from './regex.js';

/**
 * What an archive writes for. Determines nothing but the template binding;
 * sections are read from `<template>/<section>`.
 */
export type ArchiveRole = 'plain' | 'command' | 'utility' | 'shader';

/**
 * A (path, name) pair produced by a template's `target` attribute.
 * Empty strings leave the context's current binding in place.
 */
export interface TargetMatch {
  path: string;
  name: string;
}

export interface ArchiveInit {
  /** Directory of the archive, relative to the context's root path */
  path?: string;
  /** File name of the archive */
  name?: string;
  role?: ArchiveRole;
  /** Pipeline path of the template this archive is bound to */
  template?: string;
  /** Initial whole-archive rule sets */
  archiveRules?: readonly string[];
}

export interface OpenOptions {
  gzip?: boolean;
  executable?: boolean;
  mode?: ArchiveMode;
}

/**
 * Regex rule sets registered on one physical file.
 */
interface RuleLists {
  archive: string[];
  target: string[];
}

/**
 * Shared state of one physical archive, referenced by the root and every
 * composed writer.
 */
interface ArchiveShared {
  file: ArchiveFile | null;
  gzip: boolean;
  executable: boolean;
  closed: boolean;
  rules: RuleLists;
}

/**
 * Join an archive directory and file name in template form (`./name`).
 */
export function archivePathJoin(dir: string, name: string): string {
  if (!dir) return `./${name}`;
  return dir.endsWith('/') ? `${dir}${name}` : `${dir}/${name}`;
}

export class Archive {
  private root: boolean;

  private constructor(
    readonly store: PipelineStore,
    readonly context: ExportContext,
    readonly role: ArchiveRole,
    readonly template: string,
    readonly path: string,
    readonly name: string,
    private shared: ArchiveShared,
    root: boolean
  ) {
    this.root = root;
  }

  /**
   * Create a root archive. The file is not opened until `open()`.
   */
  static create(store: PipelineStore, context: ExportContext, init: ArchiveInit = {}): Archive {
    return new Archive(
      store,
      context,
      init.role ?? 'plain',
      init.template ?? '',
      init.path ?? '',
      init.name ?? '',
      {
        file: null,
        gzip: false,
        executable: false,
        closed: false,
        rules: { archive: [...(init.archiveRules ?? [])], target: [] },
      },
      true
    );
  }

  /**
   * Create a writer onto this archive's file, bound to another template.
   *
   * The new archive is not a root: closing it has no effect. The template's
   * `regexes` rule set is registered on the shared file.
   */
  compose(role: ArchiveRole, template: string, context: ExportContext = this.context): Archive {
    const child = new Archive(this.store, context, role, template, this.path, this.name, this.shared, false);
    if (template) {
      child.addRegexRule(`${template}/regexes`);
    }
    return child;
  }

  get isRoot(): boolean {
    return this.root;
  }

  get isGzip(): boolean {
    return this.shared.gzip;
  }

  get isExecutable(): boolean {
    return this.shared.executable;
  }

  /** Whether the shared file is open for writing */
  get isOpen(): boolean {
    return this.shared.file?.isOpen ?? false;
  }

  /** Absolute path of the archive file */
  get filePath(): string {
    return path.resolve(this.context.rootPath, this.path, this.name);
  }

  /** Registered whole-archive rule sets */
  get archiveRules(): readonly string[] {
    return this.shared.rules.archive;
  }

  /** Registered deferred target rule sets */
  get targetRules(): readonly string[] {
    return this.shared.rules.target;
  }

  /**
   * Open the physical file at `path + name`. The archive becomes a root.
   *
   * @throws {IOError} If path and name are empty or the file cannot be opened
   */
  async open(options: OpenOptions = {}): Promise<void> {
    if (!this.name) {
      throw new IOError('open', archivePathJoin(this.path, this.name), new Error("archive's path and name must be specified"));
    }

    const gzip = options.gzip ?? this.shared.gzip;
    const executable = options.executable ?? this.shared.executable;
    const file = await ArchiveFile.open(this.filePath, {
      gzip,
      executable,
      mode: options.mode ?? 'w',
    });

    if (!this.root) {
      // Opening from a composed writer starts a new physical file
      this.shared = { file: null, gzip, executable, closed: false, rules: { archive: [], target: [] } };
    }
    this.shared.file = file;
    this.shared.closed = false;
    this.shared.gzip = gzip;
    this.shared.executable = executable;
    this.root = true;
  }

  /**
   * Append text to the archive.
   *
   * @throws {IOError} If the archive is not open
   */
  async write(text: string, close: boolean = false): Promise<void> {
    if (text) {
      const file = this.shared.file;
      if (!file || !file.isOpen) {
        throw new IOError('write', this.filePath, new Error('archive already closed'));
      }
      await file.write(text);
    }

    if (close) {
      await this.close();
    }
  }

  /**
   * Resolve and write the template at `templatePath` once per target.
   *
   * Each target match is bound to the context's `targetPath` and
   * `targetName` while the template text is resolved.
   */
  async writeTemplate(templatePath: string, close: boolean = false): Promise<void> {
    const target = this.store.getAttribute(this.context, templatePath, 'target', { resolve: true });

    for (const match of await this.listTargets(target)) {
      const context = deriveContext(this.context, {
        ...(match.path ? { targetPath: match.path } : {}),
        ...(match.name ? { targetName: match.name } : {}),
      });
      await this.write(this.store.getText(context, templatePath));
    }

    if (close) {
      await this.close();
    }
  }

  /**
   * Write a section of the bound template (`begin`, `middle`, `end`, `rib`).
   */
  async build(section: string, close: boolean = false): Promise<void> {
    if (!this.template) {
      throw new IOError('build', this.filePath, new Error(`no template bound for section '${section}'`));
    }
    await this.writeTemplate(`${this.template}/${section}`, close);
  }

  /**
   * List the files a `target` attribute refers to.
   *
   * - no target: one empty match (keep the current binding)
   * - `dir/file` or `file`: that file (directory defaults to `targetPath`)
   * - `dir/` : the context's `targetName` in `dir`
   * - `dir/*.ext` or `*.ext`: every file in the directory with that
   *   extension, sorted by name
   *
   * @throws {IOError} If a wildcard directory cannot be listed
   */
  async listTargets(target: string | undefined): Promise<TargetMatch[]> {
    if (!target) return [{ path: '', name: '' }];

    const slash = target.lastIndexOf('/');
    const dir = slash === -1 ? '' : target.slice(0, slash + 1);
    const file = target.slice(slash + 1);
    const targetPath = dir || this.context.targetPath;

    if (!file.startsWith('*')) {
      return [{ path: targetPath, name: file || this.context.targetName }];
    }

    if (!targetPath) return [{ path: '', name: '' }];

    const extension = file.slice(1);
    const directory = path.resolve(this.context.rootPath, targetPath);
    let entries;
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (err) {
      throw new IOError('list targets in', directory, toError(err));
    }

    return entries
      .filter((entry) => entry.isFile() && path.extname(entry.name) === extension)
      .map((entry) => entry.name)
      .sort()
      .map((name) => ({ path: targetPath, name }));
  }

  /**
   * Register the rule set at `templatePath` if it declares any rules.
   */
  addRegexRule(templatePath: string): void {
    if (this.store.listElements(templatePath).length === 0) return;

    const target = this.store.getAttribute(this.context, templatePath, 'target');
    if (target) {
      this.shared.rules.target.push(templatePath);
    } else {
      this.shared.rules.archive.push(templatePath);
    }
  }

  /**
   * Close the archive. Only a root archive closes the file; composed writers
   * return immediately. After the file is closed the whole-archive rules are
   * applied once. Safe to call multiple times.
   *
   * @throws {IOError} If the file cannot be flushed
   */
  async close(): Promise<void> {
    if (!this.root) return;

    const file = this.shared.file;
    if (!file || this.shared.closed) return;
    this.shared.closed = true;

    await file.close();

    if (this.shared.rules.archive.length > 0) {
      try {
        await this.applyArchiveRules(file);
      } catch (err) {
        console.warn(`Regex rules not applied to '${file.filePath}': ${toError(err).message}`);
      }
    }
  }

  /**
   * Apply every deferred target rule set to the files it matches.
   *
   * Each matched file is opened read-only as a root archive owning only that
   * rule set and closed again, which rewrites it. Whether matched files are
   * gzip is declared by the rule set's own `gzip` attribute. A target that
   * cannot be opened is skipped with a warning.
   */
  async applyTargetRegexes(options: { signal?: AbortSignal } = {}): Promise<void> {
    for (const rulePath of this.shared.rules.target) {
      const target = this.store.getAttribute(this.context, rulePath, 'target', { resolve: true });
      const gzip = parseFlag(
        this.store.getAttribute(this.context, rulePath, 'gzip', { resolve: true, default: 'False' }),
        `'gzip' attribute of ${rulePath}`
      );

      for (const match of await this.listTargets(target)) {
        if (!match.name) continue;
        if (options.signal?.aborted) return;

        const archive = Archive.create(this.store, this.context, {
          path: match.path,
          name: match.name,
          archiveRules: [rulePath],
        });
        try {
          await archive.open({ mode: 'r', gzip });
          await archive.close();
        } catch (err) {
          console.warn(`Regex rules not applied to '${archive.filePath}': ${toError(err).message}`);
        }
      }
    }
  }

  private async applyArchiveRules(file: ArchiveFile): Promise<void> {
    let text = await file.readText();

    for (const rulePath of this.shared.rules.archive) {
      for (const element of this.store.listElements(rulePath)) {
        const rule = `${rulePath}/${element}`;
        text = applyRegexRule(text, {
          regex: this.store.getAttribute(this.context, rule, 'regex', { resolve: true, default: '' }),
          replace: this.store.getAttribute(this.context, rule, 'replace', { resolve: true, default: '' }),
          matches: parseMatchCount(this.store.getAttribute(this.context, rule, 'matches', { resolve: true, default: '0' })),
        });
      }
    }

    await file.replaceText(text);
  }
}
