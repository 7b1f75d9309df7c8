/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * tessera prepare command - Prepare the export directory tree
 *
 * Usage:
 *   tessera prepare --scene shot.json --pipeline pipelines.json
 *   tessera prepare --clean DIR,FRA --purge TMP,SHD
 */

import { Exporter, StaticSceneProvider } from '@tessera/core';
import {
  exitError,
  formatError,
  loadDocuments,
  log,
  parseExportPathKeys,
  type DocumentOptions,
} from '../utils.js';

export async function prepareCommand(
  options: DocumentOptions & { clean?: string; purge?: string }
): Promise<void> {
  try {
    const { pipelines, scene } = await loadDocuments(options);
    const exporter = new Exporter(pipelines, new StaticSceneProvider(scene));

    await exporter.prepareExport({
      clean: options.clean !== undefined ? parseExportPathKeys(options.clean) : undefined,
      purge: options.purge !== undefined ? parseExportPathKeys(options.purge) : undefined,
    });

    log(`Prepared ${exporter.exportDirectory}`);
    for (const pass of exporter.passSnapshots) {
      const state = pass.enabled ? '' : ' (disabled)';
      console.log(`  P${String(pass.index).padStart(5, '0')} ${pass.name} ${pass.type} ${pass.start}-${pass.end}:${pass.step}${state}`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
