/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * @tessera/types: shared type definitions for Tessera
 *
 * Terminology:
 * - **Template**: a pipeline element whose text (with tokens) is written to an archive
 * - **Token**: `@[KIND:BODY:FORMAT]@`, resolved against an export context
 * - **Archive**: a generated file, possibly written by several composed writers
 * - **Command**: a generated shell script executed as a child process
 * - **Bucket**: the queue of commands of one category
 */

// Export context
export {
  type AttributeRecord,
  type AttributeValue,
  type PassType,
  type PassSnapshot,
  ContextWindows,
  type ContextWindow,
  isContextWindow,
  type ExportContext,
  emptyContext,
  deriveContext,
  panelContext,
} from './context.js';

// Commands
export {
  CommandCategories,
  type CommandCategory,
  type CommandState,
  isCommandCategory,
} from './commands.js';

// Export directory layout
export {
  ExportPaths,
  ExportPathKeys,
  ArchivePathKeys,
  type ExportPathKey,
  isExportPathKey,
  exportRelativePath,
} from './paths.js';

// Pipeline definitions
export {
  PipelineElementType,
  PipelineDocumentType,
  type PipelineElement,
  type PipelineElementInput,
  type PipelineDocument,
  PanelKinds,
  type PanelKind,
  isPanelKind,
  type PanelFilter,
  type AttributeOptions,
  type PipelineStore,
} from './pipeline.js';

// Scene descriptions
export {
  AttributeValueType,
  AttributeRecordType,
  PassDescriptionType,
  type PassDescription,
  ExportOptionsType,
  type ExportOptions,
  EditorTextType,
  type EditorText,
  SceneDocumentType,
  type SceneDescription,
  type SceneProvider,
} from './scene.js';
