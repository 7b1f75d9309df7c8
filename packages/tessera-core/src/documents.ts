/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Loading pipeline and scene documents from JSON files.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';
import {
  PipelineDocumentType,
  SceneDocumentType,
  type SceneDescription,
  type SceneProvider,
} from '@tessera/types';
import { DocumentError, IOError, toError } from './errors.js';
import { DocumentPipelineStore } from './pipelineStore.js';

/**
 * Validate parsed JSON against a document schema.
 *
 * @throws {DocumentError} Naming the first issue and where it occurred
 */
export function parseDocument<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DocumentError(source, `${issue?.message ?? 'invalid document'}${where}`);
  }
  return result.data;
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new IOError('read', filePath, toError(err));
  }
  try {
    const value: unknown = JSON.parse(content);
    return value;
  } catch (err) {
    throw new DocumentError(filePath, toError(err).message);
  }
}

/**
 * Load a pipeline document.
 *
 * @throws {IOError} If the file cannot be read
 * @throws {DocumentError} If the file is not a valid pipeline document
 */
export async function pipelineLoad(filePath: string): Promise<DocumentPipelineStore> {
  const document = parseDocument(PipelineDocumentType, await readJson(filePath), filePath);
  return new DocumentPipelineStore(document);
}

/**
 * Load a scene document. A scene that names no project path uses the
 * document's own location.
 *
 * @throws {IOError} If the file cannot be read
 * @throws {DocumentError} If the file is not a valid scene document
 */
export async function sceneLoad(filePath: string): Promise<SceneDescription> {
  const scene = parseDocument(SceneDocumentType, await readJson(filePath), filePath);
  return scene.projectPath ? scene : { ...scene, projectPath: path.resolve(filePath) };
}

/**
 * SceneProvider over a fixed description.
 */
export class StaticSceneProvider implements SceneProvider {
  constructor(private readonly scene: SceneDescription) {}

  describe(): SceneDescription {
    return this.scene;
  }
}
