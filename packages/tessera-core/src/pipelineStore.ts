/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * PipelineStore over an in-memory pipeline document.
 */

import type {
  AttributeOptions,
  ExportContext,
  PanelFilter,
  PanelKind,
  PipelineDocument,
  PipelineElement,
  PipelineStore,
} from '@tessera/types';
import { isTruthy, resolveLinks } from './links.js';

export class DocumentPipelineStore implements PipelineStore {
  constructor(private readonly document: PipelineDocument) {}

  getAttribute(context: ExportContext, path: string, name: string, options: AttributeOptions & { default: string }): string;
  getAttribute(context: ExportContext, path: string, name: string, options?: AttributeOptions): string | undefined;
  getAttribute(context: ExportContext, path: string, name: string, options: AttributeOptions = {}): string | undefined {
    const value = this.findElement(path)?.attributes[name];
    if (value === undefined) return options.default;
    return options.resolve ? resolveLinks(value, context, `'${name}' attribute of ${path}`) : value;
  }

  getText(context: ExportContext, path: string): string {
    const text = this.findElement(path)?.text ?? '';
    return resolveLinks(text, context, path);
  }

  listElements(path: string): string[] {
    const element = this.findElement(path);
    return element ? Object.keys(element.elements) : [];
  }

  listPanels(kind: PanelKind, filter: PanelFilter = {}): string[] {
    const panels: string[] = [];
    for (const pipeline of this.listPipelines()) {
      for (const panel of this.listElements(`${pipeline}/${kind}`)) {
        const attributes = this.findElement(`${pipeline}/${kind}/${panel}`)?.attributes ?? {};
        if (filter.type !== undefined && attributes['type']?.toUpperCase() !== filter.type) continue;
        if (filter.window !== undefined && attributes['window']?.toUpperCase() !== filter.window) continue;
        panels.push(`${pipeline}/${kind}/${panel}`);
      }
    }
    return panels;
  }

  listPipelines(): string[] {
    return Object.keys(this.document.pipelines);
  }

  /**
   * A panel is enabled when it exists and both it and its pipeline resolve
   * their `enabled` attribute (default True) to a truthy value.
   */
  isPanelEnabled(context: ExportContext, panelPath: string): boolean {
    if (!this.findElement(panelPath)) return false;
    const pipeline = panelPath.split('/')[0] ?? '';
    return this.isEnabled(context, pipeline) && this.isEnabled(context, panelPath);
  }

  private isEnabled(context: ExportContext, path: string): boolean {
    return isTruthy(this.getAttribute(context, path, 'enabled', { resolve: true, default: 'True' }));
  }

  private findElement(path: string): PipelineElement | undefined {
    const [pipeline = '', ...rest] = path.split('/').filter((segment) => segment !== '');
    let element: PipelineElement | undefined = Object.prototype.hasOwnProperty.call(this.document.pipelines, pipeline)
      ? this.document.pipelines[pipeline]
      : undefined;
    for (const segment of rest) {
      if (!element || !Object.prototype.hasOwnProperty.call(element.elements, segment)) return undefined;
      element = element.elements[segment];
    }
    return element;
  }
}
