/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * tessera panels command - List the panels of the pipelines
 *
 * Usage:
 *   tessera panels command_panels --type RENDER
 *   tessera panels utility_panels --window WORLD
 */

import { sceneContext } from '@tessera/core';
import {
  isCommandCategory,
  isContextWindow,
  isPanelKind,
  panelContext,
  PanelKinds,
  type PanelFilter,
} from '@tessera/types';
import { exitError, formatError, loadDocuments, type DocumentOptions } from '../utils.js';

export async function panelsCommand(
  kind: string,
  options: DocumentOptions & { type?: string; window?: string }
): Promise<void> {
  try {
    if (!isPanelKind(kind)) {
      throw new Error(`Unknown panel kind '${kind}' (expected one of ${PanelKinds.join(', ')})`);
    }

    const filter: PanelFilter = {};
    if (options.type !== undefined) {
      const type = options.type.toUpperCase();
      if (!isCommandCategory(type)) throw new Error(`Unknown command type '${options.type}'`);
      filter.type = type;
    }
    if (options.window !== undefined) {
      const window = options.window.toUpperCase();
      if (!isContextWindow(window)) throw new Error(`Unknown window '${options.window}'`);
      filter.window = window;
    }

    const { pipelines, scene } = await loadDocuments(options);
    const context = sceneContext(scene);
    const panels = pipelines.listPanels(kind, filter);

    if (panels.length === 0) {
      console.log('No panels');
      return;
    }
    for (const panel of panels) {
      const enabled = pipelines.isPanelEnabled(panelContext(context, panel), panel);
      console.log(`${panel}${enabled ? '' : ' (disabled)'}`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}
