/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ExportPathKeys, ExportPaths, type ExportPathKey } from '@tessera/types';
import { DirectoryError, isNotFoundError, toError } from './errors.js';

export interface PrepareDirectoriesOptions {
  /** Directories whose files are removed (subdirectories are kept) */
  clean?: Iterable<ExportPathKey>;
  /** Directories whose files and subdirectories are removed */
  purge?: Iterable<ExportPathKey>;
}

/**
 * Absolute path of an export directory.
 */
export function exportDirectory(root: string, key: ExportPathKey): string {
  return path.join(root, ...ExportPaths[key]);
}

/**
 * Create the export directory tree under `root`.
 *
 * Directories are handled in table order (parents before children). A
 * missing directory is created; an existing one is purged, cleaned or left
 * alone. Purge wins over clean for the same key.
 *
 * @throws {DirectoryError} On any filesystem failure
 */
export async function prepareDirectories(root: string, options: PrepareDirectoriesOptions = {}): Promise<void> {
  const clean = new Set(options.clean ?? []);
  const purge = new Set(options.purge ?? []);

  for (const key of ExportPathKeys) {
    const dir = exportDirectory(root, key);

    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (!isNotFoundError(err)) {
        throw new DirectoryError(dir, toError(err));
      }
      try {
        await fs.mkdir(dir, { recursive: true });
      } catch (mkdirErr) {
        throw new DirectoryError(dir, toError(mkdirErr));
      }
      continue;
    }

    const removeDirectories = purge.has(key);
    if (!removeDirectories && !clean.has(key)) continue;

    for (const entry of entries) {
      if (entry.isDirectory() && !removeDirectories) continue;
      const entryPath = path.join(dir, entry.name);
      try {
        await fs.rm(entryPath, { recursive: true, force: true });
      } catch (err) {
        throw new DirectoryError(entryPath, toError(err));
      }
    }
  }
}
