/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * tessera resolve command - Resolve a template against the scene
 *
 * Usage:
 *   tessera resolve 'P@[EVAL:.currentPass:#####]@.rib' --scene shot.json
 *   tessera resolve '@[EVAL:.pass.name]@' --frame 12
 */

import { activePassIndex, passSnapshots, resolveLinks, sceneLoad, sceneContext } from '@tessera/core';
import { deriveContext } from '@tessera/types';
import { documentPath, exitError, formatError, SCENE_VARIABLE } from '../utils.js';

/**
 * Print `template` resolved in the context of the scene's active pass.
 */
export async function resolveCommand(
  template: string,
  options: { scene?: string; frame?: string }
): Promise<void> {
  try {
    const scene = await sceneLoad(documentPath(options.scene, SCENE_VARIABLE));
    const passes = passSnapshots(scene);
    const index = activePassIndex(scene, passes.length);

    const frame = options.frame !== undefined ? parseInt(options.frame, 10) : scene.frameCurrent;
    if (!Number.isInteger(frame)) {
      throw new Error(`Invalid frame '${options.frame}'`);
    }

    const context = deriveContext(sceneContext(scene), {
      currentFrame: frame,
      currentPass: index,
      pass: passes[index - 1] ?? null,
    });
    console.log(resolveLinks(template, context, 'command line'));
  } catch (err) {
    exitError(formatError(err));
  }
}
