/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Fixed layout of an export directory.
 *
 * Each key names one directory relative to the export root:
 *
 * | key | directory |
 * |-----|-----------|
 * | DIR | (root) |
 * | FRA | Archives |
 * | WLD | Archives/Worlds |
 * | LAM | Archives/Lights |
 * | OBJ | Archives/Objects |
 * | GEO | Archives/Objects/Geometry |
 * | MAT | Archives/Objects/Materials |
 * | MAP | Maps |
 * | SHD | Shaders |
 * | TEX | Textures |
 * | RND | Renders |
 * | TMP | Cache |
 */

export const ExportPaths = {
  DIR: [],
  FRA: ['Archives'],
  WLD: ['Archives', 'Worlds'],
  LAM: ['Archives', 'Lights'],
  OBJ: ['Archives', 'Objects'],
  GEO: ['Archives', 'Objects', 'Geometry'],
  MAT: ['Archives', 'Objects', 'Materials'],
  MAP: ['Maps'],
  SHD: ['Shaders'],
  TEX: ['Textures'],
  RND: ['Renders'],
  TMP: ['Cache'],
} as const satisfies Record<string, readonly string[]>;

export type ExportPathKey = keyof typeof ExportPaths;

export const ExportPathKeys = Object.keys(ExportPaths).filter(isExportPathKey);

export function isExportPathKey(value: string): value is ExportPathKey {
  return Object.prototype.hasOwnProperty.call(ExportPaths, value);
}

/** Archive directories cleaned when archives are purged */
export const ArchivePathKeys: readonly ExportPathKey[] = ['FRA', 'WLD', 'LAM', 'OBJ', 'GEO', 'MAT'];

/**
 * Relative path of an export directory, in template form (`./Archives/`).
 *
 * Generated scripts run with the export root as working directory, so
 * templates address files relative to it.
 */
export function exportRelativePath(key: ExportPathKey, ...rest: string[]): string {
  const segments = [...ExportPaths[key], ...rest];
  return segments.length === 0 ? './' : `./${segments.join('/')}/`;
}
