/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * CLI utilities for option parsing, document loading and output
 */

import { resolve } from 'path';
import { pipelineLoad, sceneLoad, type DocumentPipelineStore } from '@tessera/core';
import { isExportPathKey, type ExportPathKey, type SceneDescription } from '@tessera/types';

/** Environment variable naming the pipeline document */
export const PIPELINE_VARIABLE = 'TESSERA_PIPELINE';

/** Environment variable naming the scene document */
export const SCENE_VARIABLE = 'TESSERA_SCENE';

export interface DocumentOptions {
  pipeline?: string;
  scene?: string;
}

/**
 * Format error for CLI output.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Exit with error message.
 */
export function exitError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/**
 * Local time as `HH:MM:SS`.
 */
export function timestamp(date: Date = new Date()): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()].map((n) => String(n).padStart(2, '0')).join(':');
}

/**
 * Print a timestamped progress line.
 */
export function log(message: string): void {
  console.log(`[${timestamp()}] ${message}`);
}

/**
 * Parse a frame list: `12`, `1-10`, `1,3,5` or a mix (`1-3,7`).
 *
 * Frames are returned in the order given, without duplicates.
 */
export function parseFrames(spec: string): number[] {
  const frames: number[] = [];
  const seen = new Set<number>();
  const add = (frame: number) => {
    if (!seen.has(frame)) {
      seen.add(frame);
      frames.push(frame);
    }
  };

  for (const part of spec.split(',')) {
    const item = part.trim();
    const range = /^(\d+)-(\d+)$/.exec(item);
    if (range) {
      const start = parseInt(range[1] ?? '', 10);
      const end = parseInt(range[2] ?? '', 10);
      if (start > end) {
        throw new Error(`Invalid frame range '${item}': start is after end`);
      }
      for (let frame = start; frame <= end; frame++) add(frame);
    } else if (/^\d+$/.test(item)) {
      add(parseInt(item, 10));
    } else {
      throw new Error(`Invalid frame '${item}' (expected N, N-M or a comma-separated list)`);
    }
  }

  return frames;
}

/**
 * Parse a comma-separated list of export directory keys (`DIR,TMP`).
 */
export function parseExportPathKeys(spec: string): ExportPathKey[] {
  return spec
    .split(',')
    .map((key) => key.trim().toUpperCase())
    .filter((key) => key !== '')
    .map((key) => {
      if (!isExportPathKey(key)) {
        throw new Error(`Unknown export directory '${key}'`);
      }
      return key;
    });
}

/**
 * Path of a document from its option, falling back to an environment variable.
 */
export function documentPath(
  option: string | undefined,
  variable: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const value = option ?? env[variable];
  if (!value) {
    throw new Error(`No document given: pass an option or set ${variable}`);
  }
  return resolve(value);
}

/**
 * Load the pipeline and scene documents named by the options or environment.
 */
export async function loadDocuments(
  options: DocumentOptions
): Promise<{ pipelines: DocumentPipelineStore; scene: SceneDescription }> {
  const pipelines = await pipelineLoad(documentPath(options.pipeline, PIPELINE_VARIABLE));
  const scene = await sceneLoad(documentPath(options.scene, SCENE_VARIABLE));
  return { pipelines, scene };
}
