/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Export context and attribute values.
 *
 * An export context is the scope that template tokens resolve against. It is
 * an immutable value: every nested export unit (pass, shader library, command)
 * derives its own copy with `deriveContext` instead of mutating and restoring
 * shared fields.
 *
 * Token paths address the context's own fields, e.g. `.currentFrame`,
 * `.pass.samplesX` or `.datablock.name`.
 */

/**
 * A record of named attribute values supplied by collaborators
 * (scene properties, world settings, pass settings).
 */
export type AttributeRecord = { readonly [key: string]: AttributeValue | undefined };

/**
 * Any value a token path can reach.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeRecord
  | readonly AttributeValue[];

/**
 * Kind of render pass.
 *
 * Only `BEAUTY` passes contribute to the display output list.
 */
export type PassType = 'BEAUTY' | 'SHADOW' | 'ENVIRONMENT' | 'OTHER';

/**
 * Read-only snapshot of a pass, resolved once per export run.
 */
export type PassSnapshot = {
  /** 1-based pass index */
  readonly index: number;
  readonly name: string;
  readonly enabled: boolean;
  readonly type: PassType;
  /** First frame (inclusive) */
  readonly start: number;
  /** Last frame (inclusive) */
  readonly end: number;
  readonly step: number;
  /** Display output file (may contain tokens) */
  readonly output: string;
  readonly layer: string;
  readonly multilayer: boolean;
  readonly samplesX: number;
  readonly samplesY: number;
  readonly shadingRate: number;
  /** Free-form pass attributes */
  readonly attributes: AttributeRecord;
};

/**
 * Window a panel belongs to (where its properties live).
 */
export const ContextWindows = ['SCENE', 'RENDER', 'WORLD', 'OBJECT', 'MATERIAL'] as const;

export type ContextWindow = (typeof ContextWindows)[number];

export function isContextWindow(value: string): value is ContextWindow {
  return (ContextWindows as readonly string[]).includes(value);
}

/**
 * Scoped state for one export unit.
 */
export type ExportContext = {
  /** Pipeline of the panel in scope */
  readonly pipeline: string;
  /** Panel category (`command_panels`, `utility_panels`, ...) */
  readonly category: string;
  /** Panel name */
  readonly panel: string;
  readonly window: ContextWindow;
  /** 1-based shader library index (0 outside shader export) */
  readonly currentLibrary: number;
  readonly currentFrame: number;
  /** 1-based pass index (0 outside pass export) */
  readonly currentPass: number;
  /** Running command counter within the enclosing unit */
  readonly currentCommand: number;
  /** Absolute export directory */
  readonly rootPath: string;
  /** Target directory bound for templates, relative to `rootPath` */
  readonly targetPath: string;
  /** Target file name bound for templates */
  readonly targetName: string;
  /** The datablock currently in scope */
  readonly datablock: AttributeRecord | null;
  /** Scene-level attributes */
  readonly scene: AttributeRecord | null;
  /** Pass being exported */
  readonly pass: PassSnapshot | null;
  /** Display resolution width */
  readonly resX: number;
  /** Display resolution height */
  readonly resY: number;
  readonly interactive: boolean;
  /** Environment variables visible to `ENV` tokens */
  readonly environment: AttributeRecord;
};

/**
 * Create a context with every field at its neutral value.
 */
export function emptyContext(): ExportContext {
  return {
    pipeline: '',
    category: '',
    panel: '',
    window: 'SCENE',
    currentLibrary: 0,
    currentFrame: 0,
    currentPass: 0,
    currentCommand: 0,
    rootPath: '',
    targetPath: '',
    targetName: '',
    datablock: null,
    scene: null,
    pass: null,
    resX: 0,
    resY: 0,
    interactive: false,
    environment: {},
  };
}

/**
 * Derive a child context. The parent is left untouched.
 */
export function deriveContext(parent: ExportContext, patch: Partial<ExportContext>): ExportContext {
  return { ...parent, ...patch };
}

/**
 * Derive a context scoped to a panel path (`pipeline/category/panel`).
 */
export function panelContext(parent: ExportContext, panelPath: string): ExportContext {
  const [pipeline = '', category = '', panel = ''] = panelPath.split('/');
  return deriveContext(parent, { pipeline, category, panel });
}
