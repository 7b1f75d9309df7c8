/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { PassDescription, PassSnapshot, SceneDescription } from '@tessera/types';

/** Pass added to scenes that declare none */
export const DEFAULT_PASS_NAME = 'Beauty Pass';

/**
 * Whether `frame` is in `range(start, end + 1, step)`.
 */
export function frameInRange(frame: number, range: { start: number; end: number; step: number }): boolean {
  if (range.step <= 0) return false;
  if (frame < range.start || frame > range.end) return false;
  return (frame - range.start) % range.step === 0;
}

/**
 * Snapshot every pass of the scene with its resolved frame range.
 *
 * Zero range fields inherit the scene's frame range. A scene without passes
 * gets one enabled beauty pass.
 */
export function passSnapshots(scene: SceneDescription): PassSnapshot[] {
  const passes: PassDescription[] =
    scene.passes.length > 0
      ? scene.passes
      : [
          {
            name: DEFAULT_PASS_NAME,
            enabled: true,
            type: 'BEAUTY',
            rangeStart: 0,
            rangeEnd: 0,
            rangeStep: 0,
            output: '',
            layer: '',
            multilayer: false,
            samplesX: 0,
            samplesY: 0,
            shadingRate: 0,
            attributes: {},
          },
        ];

  return passes.map((pass, i) => ({
    index: i + 1,
    name: pass.name,
    enabled: pass.enabled,
    type: pass.type,
    start: pass.rangeStart || scene.frameStart,
    end: pass.rangeEnd || scene.frameEnd,
    step: pass.rangeStep || scene.frameStep,
    output: pass.output,
    layer: pass.layer,
    multilayer: pass.multilayer,
    samplesX: pass.samplesX,
    samplesY: pass.samplesY,
    shadingRate: pass.shadingRate,
    attributes: pass.attributes,
  }));
}

/**
 * 1-based index of the active pass, clamped to the available passes.
 */
export function activePassIndex(scene: SceneDescription, passCount: number): number {
  if (passCount <= 0) return 0;
  return Math.min(Math.max(scene.activePass, 0), passCount - 1) + 1;
}
