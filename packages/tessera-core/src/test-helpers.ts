/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for tessera-core
 * Provides temporary directories, pipeline stores and scenes for tests
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  deriveContext,
  emptyContext,
  PipelineDocumentType,
  SceneDocumentType,
  type ExportContext,
  type PipelineElementInput,
  type SceneDescription,
} from '@tessera/types';
import { DocumentPipelineStore } from './pipelineStore.js';

/**
 * Creates a temporary directory for testing
 * @returns Path to temporary directory
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'tessera-test-'));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Context rooted at `rootPath` with an empty environment
 */
export function testContext(rootPath: string, patch: Partial<ExportContext> = {}): ExportContext {
  return deriveContext(emptyContext(), { rootPath, ...patch });
}

/**
 * Pipeline store over the given pipelines (elements may omit defaults)
 */
export function testPipelines(pipelines: Record<string, PipelineElementInput>): DocumentPipelineStore {
  return new DocumentPipelineStore(PipelineDocumentType.parse({ pipelines }));
}

/**
 * Saved scene exporting to `exportPath`, with schema defaults for the rest
 */
export function testScene(exportPath: string, overrides: Record<string, unknown> = {}): SceneDescription {
  return SceneDocumentType.parse({
    projectPath: join(exportPath, 'project.json'),
    exportPath,
    ...overrides,
  });
}
