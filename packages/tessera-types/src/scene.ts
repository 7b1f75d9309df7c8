/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Scene and pass descriptions.
 *
 * The scene is owned by the host application. The exporter only reads a
 * snapshot of it through a `SceneProvider`, once per export run.
 */

import { z } from 'zod';
import type { AttributeValue } from './context.js';

export const AttributeValueType: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueType),
    z.record(AttributeValueType),
  ])
);

export const AttributeRecordType = z.record(AttributeValueType);

/**
 * A render pass as configured in the scene.
 *
 * Range fields of 0 inherit the scene's frame range.
 */
export const PassDescriptionType = z.object({
  name: z.string().default('Beauty Pass'),
  enabled: z.boolean().default(true),
  type: z.enum(['BEAUTY', 'SHADOW', 'ENVIRONMENT', 'OTHER']).default('BEAUTY'),
  rangeStart: z.number().int().nonnegative().default(0),
  rangeEnd: z.number().int().nonnegative().default(0),
  rangeStep: z.number().int().nonnegative().default(0),
  /** Display output file (may contain tokens) */
  output: z.string().default(''),
  layer: z.string().default(''),
  multilayer: z.boolean().default(false),
  samplesX: z.number().int().nonnegative().default(0),
  samplesY: z.number().int().nonnegative().default(0),
  shadingRate: z.number().nonnegative().default(0),
  attributes: AttributeRecordType.default({}),
});

export type PassDescription = z.infer<typeof PassDescriptionType>;

/**
 * Global export toggles.
 */
export const ExportOptionsType = z.object({
  /** Execute COMPILE and INFO commands */
  compileShaders: z.boolean().default(false),
  /** Generate and execute OPTIMIZE commands */
  optimizeTextures: z.boolean().default(false),
  /** Execute RENDER and POSTRENDER commands */
  renderArchives: z.boolean().default(true),
  /** Write pass archives */
  exportArchives: z.boolean().default(true),
  /** Clean archive directories when preparing */
  purgeArchives: z.boolean().default(false),
  /** Purge and rewrite shader sources */
  purgeShaders: z.boolean().default(false),
  /** Purge the texture directory */
  purgeTextures: z.boolean().default(false),
  /** Interactive session: never clean, always render, do not wait */
  interactive: z.boolean().default(false),
  /** Gzip pass archives */
  compressArchives: z.boolean().default(false),
  /** Only write the archive of the active pass */
  activePassOnly: z.boolean().default(false),
});

export type ExportOptions = z.infer<typeof ExportOptionsType>;

/**
 * Shader source held in the host's text editor.
 */
export const EditorTextType = z.object({
  name: z.string(),
  filepath: z.string().default(''),
  text: z.string().default(''),
});

export type EditorText = z.infer<typeof EditorTextType>;

export const SceneDocumentType = z.object({
  name: z.string().default('Scene'),
  /** Saved project file; relative export paths resolve against its directory */
  projectPath: z.string().default(''),
  /** Project has unsaved changes */
  dirty: z.boolean().default(false),
  /** Export directory (may contain tokens) */
  exportPath: z.string().default(''),
  frameStart: z.number().int().nonnegative().default(1),
  frameEnd: z.number().int().nonnegative().default(1),
  frameStep: z.number().int().positive().default(1),
  frameCurrent: z.number().int().nonnegative().default(1),
  resolution: z
    .object({
      x: z.number().int().positive().default(1920),
      y: z.number().int().positive().default(1080),
      percentage: z.number().positive().default(100),
    })
    .default({}),
  passes: z.array(PassDescriptionType).default([]),
  /** Index into `passes` of the active pass */
  activePass: z.number().int().nonnegative().default(0),
  attributes: AttributeRecordType.default({}),
  world: AttributeRecordType.default({}),
  editorTexts: z.array(EditorTextType).default([]),
  options: ExportOptionsType.default({}),
});

export type SceneDescription = z.infer<typeof SceneDocumentType>;

/**
 * Source of scene snapshots.
 */
export interface SceneProvider {
  /** Current state of the scene */
  describe(): SceneDescription;
}
