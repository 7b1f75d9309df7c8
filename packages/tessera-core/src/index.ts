/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tessera Core - archive, command and export engine
 *
 * This package resolves pipeline templates into archives and command
 * scripts, runs the scripts, and post-processes their output. It has no UI
 * dependencies and can be used programmatically.
 */

// Link resolution
export { resolveLinks, hasLinks, isTruthy, parseFlag } from './links.js';

// Regex rules
export { applyRegexRule, parseMatchCount, type RegexRule } from './regex.js';

// Archives
export { ArchiveFile, EXECUTABLE_MODE, type ArchiveMode, type ArchiveFileOptions } from './archiveFile.js';
export {
  Archive,
  archivePathJoin,
  type ArchiveRole,
  type ArchiveInit,
  type OpenOptions,
  type TargetMatch,
} from './archive.js';

// Commands
export { Command, COMMAND_SECTIONS, type CommandInit, type CommandExecuteOptions } from './command.js';

// Passes and directories
export { frameInRange, passSnapshots, activePassIndex, DEFAULT_PASS_NAME } from './passes.js';
export { prepareDirectories, exportDirectory, type PrepareDirectoriesOptions } from './directories.js';

// Documents
export { DocumentPipelineStore } from './pipelineStore.js';
export { parseDocument, pipelineLoad, sceneLoad, StaticSceneProvider } from './documents.js';

// Export
export { writePassArchive, frameHeader, type GeometryTranslator, type PassArchiveOptions } from './sceneArchive.js';
export {
  Exporter,
  sceneContext,
  EDITOR_PIPELINE,
  LAUNCHER_NAME,
  type DisplayOutput,
  type DisplayPass,
  type ExporterOptions,
  type PrepareExportOptions,
  type ExecuteCommandsOptions,
} from './exporter.js';

// Errors
export {
  TesseraError,
  ResolutionError,
  DocumentError,
  IOError,
  DirectoryError,
  DirtyStateError,
  ProcessError,
  ExportError,
  ExportAbortedError,
  type CommandExecutionResult,
  isNotFoundError,
  isNotEmptyError,
  toError,
} from './errors.js';
