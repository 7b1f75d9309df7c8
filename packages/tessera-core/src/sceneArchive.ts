/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Scene description archive of one pass and frame.
 */

import {
  deriveContext,
  panelContext,
  type AttributeRecord,
  type ContextWindow,
  type ExportContext,
  type PanelKind,
  type PipelineStore,
} from '@tessera/types';
import { Archive, type ArchiveRole } from './archive.js';
import { toError } from './errors.js';
import { resolveLinks } from './links.js';

/**
 * Writes the geometry of the world block. Implemented by the host.
 */
export interface GeometryTranslator {
  worldText(context: ExportContext): string | Promise<string>;
}

export interface PassArchiveOptions {
  /** Archive directory, relative to the export root */
  path: string;
  name: string;
  gzip: boolean;
  /** World datablock, in scope for WORLD panels */
  world: AttributeRecord;
  geometry?: GeometryTranslator;
}

const FRAME_HEADER = [
  'Format @[EVAL:.resX]@ @[EVAL:.resY]@ 1',
  '@[EVAL:"PixelSamples @[EVAL:.pass.samplesX]@ @[EVAL:.pass.samplesY]@" if @[EVAL:.pass.samplesX]@ else ""]@',
  '@[EVAL:"ShadingRate @[EVAL:.pass.shadingRate]@" if @[EVAL:.pass.shadingRate]@ else ""]@',
];

/**
 * Compose one writer per enabled panel of `kind` in `window`.
 */
function composePanels(
  archive: Archive,
  store: PipelineStore,
  context: ExportContext,
  kind: PanelKind,
  role: ArchiveRole,
  window: ContextWindow
): Archive[] {
  return store
    .listPanels(kind, { window })
    .map((panel) => ({ panel, context: panelContext(deriveContext(context, { window }), panel) }))
    .filter(({ panel, context }) => store.isPanelEnabled(context, panel))
    .map(({ panel, context }) => archive.compose(role, panel, context));
}

/**
 * Resolve the frame header, dropping lines that resolve to nothing.
 */
export function frameHeader(context: ExportContext): string {
  return FRAME_HEADER.map((line) => resolveLinks(line, context, 'frame header'))
    .filter((line) => line.trim() !== '')
    .map((line) => `${line}\n`)
    .join('');
}

/**
 * Write the archive of the pass in `context` for its current frame.
 *
 * ```
 * scene utilities: begin
 * FrameBegin <frame>
 *   render utilities: begin
 *   <frame header>
 *   WorldBegin
 *     world utilities: begin
 *     world shaders: rib
 *     <geometry>
 *     world utilities: end
 *   WorldEnd
 *   render utilities: end
 * FrameEnd
 * scene utilities: end
 * ```
 *
 * The archive is closed on every path.
 */
export async function writePassArchive(
  store: PipelineStore,
  context: ExportContext,
  options: PassArchiveOptions
): Promise<void> {
  const archive = Archive.create(store, context, { path: options.path, name: options.name });
  await archive.open({ gzip: options.gzip });

  try {
    const worldContext = deriveContext(context, { datablock: options.world });
    const sceneUtilities = composePanels(archive, store, context, 'utility_panels', 'utility', 'SCENE');
    const renderUtilities = composePanels(archive, store, context, 'utility_panels', 'utility', 'RENDER');
    const worldUtilities = composePanels(archive, store, worldContext, 'utility_panels', 'utility', 'WORLD');
    const worldShaders = composePanels(archive, store, worldContext, 'shader_panels', 'shader', 'WORLD');

    for (const utility of sceneUtilities) await utility.build('begin');
    await archive.write(`FrameBegin ${context.currentFrame}\n`);
    for (const utility of renderUtilities) await utility.build('begin');
    await archive.write(frameHeader(context));
    await archive.write('WorldBegin\n');
    for (const utility of worldUtilities) await utility.build('begin');
    for (const shader of worldShaders) await shader.build('rib');
    if (options.geometry) {
      await archive.write(await options.geometry.worldText(worldContext));
    }
    for (const utility of worldUtilities) await utility.build('end');
    await archive.write('WorldEnd\n');
    for (const utility of renderUtilities) await utility.build('end');
    await archive.write('FrameEnd\n');
    for (const utility of sceneUtilities) await utility.build('end');
  } catch (err) {
    try {
      await archive.close();
    } catch (closeErr) {
      console.warn(`Failed to close '${archive.filePath}': ${toError(closeErr).message}`);
    }
    throw err;
  }

  await archive.close();
}
