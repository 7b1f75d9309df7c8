/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Pipeline definition types.
 *
 * A pipeline document is a tree of named elements. Every element carries
 * string attributes, optional text, and ordered child elements. Elements are
 * addressed by slash-separated paths starting with the pipeline name:
 *
 * ```
 * Basic/command_panels/compile/middle
 * └──┬┘ └─────┬──────┘ └──┬──┘ └─┬──┘
 * pipeline  category    panel  section
 * ```
 *
 * Recognised elements and attributes:
 * - pipeline: `enabled`, `library`, `compile`, `build`
 * - `<pipeline>/shader_sources/<name>`: `filepath`, text = shader source
 * - `<pipeline>/command_panels/<panel>`: `type` (command category),
 *   `enabled`, `extension`, `execute`; sections `begin`, `middle`, `end`
 * - `<pipeline>/utility_panels/<panel>`: `window`, `enabled`; sections
 *   `begin`, `end`
 * - `<pipeline>/shader_panels/<panel>`: `window`, `enabled`; section `rib`
 * - `<panel>/regexes`: `target`, `gzip`; children with `regex`, `replace`,
 *   `matches`
 * - any section: `target` (`path/file`, `path/*.ext` or `*.ext`)
 */

import { z } from 'zod';
import type { ContextWindow, ExportContext } from './context.js';
import type { CommandCategory } from './commands.js';

/**
 * Element of a pipeline document (validated form).
 */
export interface PipelineElement {
  attributes: Record<string, string>;
  text: string;
  elements: Record<string, PipelineElement>;
}

/**
 * Element of a pipeline document as written in JSON (all fields optional).
 */
export interface PipelineElementInput {
  attributes?: Record<string, string>;
  text?: string;
  elements?: Record<string, PipelineElementInput>;
}

export const PipelineElementType: z.ZodType<PipelineElement, z.ZodTypeDef, PipelineElementInput> = z.lazy(() =>
  z.object({
    attributes: z.record(z.string()).default({}),
    text: z.string().default(''),
    elements: z.record(PipelineElementType).default({}),
  })
);

/**
 * A pipeline document: pipeline name to root element.
 */
export const PipelineDocumentType = z.object({
  pipelines: z.record(PipelineElementType),
});

export type PipelineDocument = z.infer<typeof PipelineDocumentType>;

/** Panel categories a pipeline can declare */
export const PanelKinds = ['command_panels', 'utility_panels', 'shader_panels'] as const;

export type PanelKind = (typeof PanelKinds)[number];

export function isPanelKind(value: string): value is PanelKind {
  return (PanelKinds as readonly string[]).includes(value);
}

/**
 * Filter for `PipelineStore.listPanels`.
 */
export interface PanelFilter {
  /** Command category (`type` attribute) */
  type?: CommandCategory;
  /** Context window (`window` attribute) */
  window?: ContextWindow;
}

/**
 * Options for `PipelineStore.getAttribute`.
 */
export interface AttributeOptions {
  /** Resolve tokens in the attribute value against the context */
  resolve?: boolean;
  /** Value returned when the attribute is not declared */
  default?: string;
}

/**
 * Read-only access to pipeline definitions.
 */
export interface PipelineStore {
  /**
   * Read an attribute of the element at `path`.
   *
   * Returns the default (or undefined when none is given) if the element or
   * attribute does not exist.
   */
  getAttribute(context: ExportContext, path: string, name: string, options: AttributeOptions & { default: string }): string;
  getAttribute(context: ExportContext, path: string, name: string, options?: AttributeOptions): string | undefined;

  /**
   * Read the text of the element at `path`, with tokens resolved against the
   * context. A missing element has empty text.
   */
  getText(context: ExportContext, path: string): string;

  /** Names of the child elements of `path`, in document order */
  listElements(path: string): string[];

  /** Paths (`pipeline/kind/panel`) of every panel of `kind` matching the filter */
  listPanels(kind: PanelKind, filter?: PanelFilter): string[];

  /** Names of every pipeline */
  listPipelines(): string[];

  /** Whether the panel at `panelPath` is enabled in the given context */
  isPanelEnabled(context: ExportContext, panelPath: string): boolean;
}
