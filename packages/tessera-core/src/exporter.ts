/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Export orchestration.
 *
 * An Exporter prepares the export directory, generates shader sources,
 * pass archives and command scripts frame by frame, and executes the queued
 * commands in category order:
 *
 * ```
 * OPTIMIZE → COMPILE → INFO → RENDER → POSTRENDER
 * ```
 *
 * Commands within a category run sequentially. Every queued command is also
 * written to the launcher script at the export root so the whole export can
 * be replayed without the host.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ArchivePathKeys,
  CommandCategories,
  deriveContext,
  emptyContext,
  exportRelativePath,
  panelContext,
  type AttributeRecord,
  type CommandCategory,
  type ExportContext,
  type ExportPathKey,
  type PassSnapshot,
  type PipelineStore,
  type SceneDescription,
  type SceneProvider,
} from '@tessera/types';
import { Archive } from './archive.js';
import { Command } from './command.js';
import { prepareDirectories } from './directories.js';
import {
  DirectoryError,
  DirtyStateError,
  ExportAbortedError,
  ExportError,
  IOError,
  ProcessError,
  isNotEmptyError,
  isNotFoundError,
  toError,
  type CommandExecutionResult,
} from './errors.js';
import { isTruthy, parseFlag, resolveLinks } from './links.js';
import { activePassIndex, frameInRange, passSnapshots } from './passes.js';
import { writePassArchive, type GeometryTranslator } from './sceneArchive.js';

/** Pseudo-pipeline of shader sources held in the scene's editor texts */
export const EDITOR_PIPELINE = 'Editor';

/** Launcher script at the export root */
export const LAUNCHER_NAME = 'START.sh';

/** Extensions of editor texts exported as shader sources */
const SHADER_SOURCE_EXTENSIONS = new Set(['.sl', '.h']);

const PASS_ARCHIVE_NAME = 'P@[EVAL:.currentPass:#####]@_F@[EVAL:.currentFrame:#####]@.rib';

/**
 * Output of a beauty pass, for the host's display.
 */
export interface DisplayPass {
  file: string;
  layer: string;
  multilayer: boolean;
}

/**
 * Display resolution and beauty outputs of the current frame.
 */
export interface DisplayOutput {
  x: number;
  y: number;
  passes: DisplayPass[];
}

export interface ExporterOptions {
  /** Writes world geometry into pass archives */
  geometry?: GeometryTranslator;
  /** Variables visible to ENV tokens (default: the process environment) */
  environment?: AttributeRecord;
  onCommandStart?: (command: Command) => void;
  onCommandComplete?: (command: Command, result: CommandExecutionResult) => void;
  onStdout?: (command: Command, data: string) => void;
  onStderr?: (command: Command, data: string) => void;
}

export interface PrepareExportOptions {
  /** Directories whose files are removed (default DIR) */
  clean?: readonly ExportPathKey[];
  /** Directories whose contents are removed (default TMP) */
  purge?: readonly ExportPathKey[];
  /** Prepare for exporting one shader library only */
  shaderLibrary?: string;
}

export interface ExecuteCommandsOptions {
  signal?: AbortSignal;
  /** Raise a ProcessError when a command exits non-zero */
  stopOnFailure?: boolean;
}

/**
 * Create an empty command bucket set.
 */
function emptyBuckets(): Record<CommandCategory, Command[]> {
  return { OPTIMIZE: [], COMPILE: [], INFO: [], RENDER: [], POSTRENDER: [] };
}

/**
 * Environment variables as attribute values.
 */
function processEnvironment(): AttributeRecord {
  const environment: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) environment[key] = value;
  }
  return environment;
}

/**
 * Scene-level context of an export rooted at `rootPath`.
 *
 * The scene's attributes are both the scene and the datablock in scope.
 */
export function sceneContext(
  scene: SceneDescription,
  options: { rootPath?: string; environment?: AttributeRecord } = {}
): ExportContext {
  return deriveContext(emptyContext(), {
    rootPath: options.rootPath ?? '',
    datablock: scene.attributes,
    scene: scene.attributes,
    currentFrame: scene.frameCurrent,
    interactive: scene.options.interactive,
    environment: options.environment ?? processEnvironment(),
  });
}

export class Exporter {
  private scene: SceneDescription | null = null;
  private passes: PassSnapshot[] = [];
  private activePass = 0;
  private root = '';
  private frame = 0;
  private display: DisplayOutput = { x: 0, y: 0, passes: [] };
  private readonly buckets = emptyBuckets();
  private readonly environment: AttributeRecord;

  constructor(
    private readonly pipelines: PipelineStore,
    private readonly sceneProvider: SceneProvider,
    private readonly options: ExporterOptions = {}
  ) {
    this.environment = options.environment ?? processEnvironment();
  }

  /** Absolute export directory ('' before `prepareExport`) */
  get exportDirectory(): string {
    return this.root;
  }

  /** Frame of the last `exportArchives` call */
  get exportFrame(): number {
    return this.frame;
  }

  get displayOutput(): DisplayOutput {
    return this.display;
  }

  /** Pass snapshots of the current export run */
  get passSnapshots(): readonly PassSnapshot[] {
    return this.passes;
  }

  /** Queued commands of a category */
  commands(category: CommandCategory): readonly Command[] {
    return this.buckets[category];
  }

  // ===========================================================================
  // Preparation
  // ===========================================================================

  /**
   * Resolve the export directory and prepare its tree for a new export.
   *
   * Interactive sessions never clean or purge anything.
   *
   * @throws {DirtyStateError} If the project is unsaved
   * @throws {DirectoryError} If the export path is empty or the tree cannot be prepared
   */
  async prepareExport(options: PrepareExportOptions = {}): Promise<void> {
    const scene = this.sceneProvider.describe();
    if (scene.dirty || !scene.projectPath) {
      throw new DirtyStateError(scene.projectPath);
    }

    this.scene = scene;
    this.passes = passSnapshots(scene);
    this.activePass = activePassIndex(scene, this.passes.length);
    this.root = this.resolveExportPath(scene);

    const clean = new Set<ExportPathKey>(options.clean ?? ['DIR']);
    const purge = new Set<ExportPathKey>(options.purge ?? ['TMP']);

    if (scene.options.interactive) {
      clean.clear();
      purge.clear();
    } else if (!options.shaderLibrary) {
      if (scene.options.purgeArchives && !scene.options.activePassOnly) {
        for (const key of ArchivePathKeys) clean.add(key);
      }
      if (scene.options.purgeShaders) purge.add('SHD');
      if (scene.options.purgeTextures) purge.add('TEX');
    }

    await prepareDirectories(this.root, { clean, purge });

    this.frame = 0;
    this.display = { x: 0, y: 0, passes: [] };
    await this.clearCommands();
  }

  private resolveExportPath(scene: SceneDescription): string {
    const resolved = resolveLinks(scene.exportPath, this.sceneContext(scene), 'export path').trim();
    if (!resolved) {
      throw new DirectoryError(scene.exportPath, new Error('no export directory specified'));
    }

    const projectDirectory = path.dirname(path.resolve(scene.projectPath));
    // `//` marks a path relative to the project file
    const relative = resolved.startsWith('//') ? resolved.slice(2) : resolved;
    return path.resolve(projectDirectory, relative);
  }

  // ===========================================================================
  // Shaders and textures
  // ===========================================================================

  /**
   * Write shader sources and queue COMPILE and INFO commands per library.
   *
   * Without `shaderLibrary` every enabled pipeline and the editor
   * pseudo-pipeline are exported into `Shaders/<pipeline>/`. With it, only
   * that pipeline's external `library` directory is compiled. Interactive
   * sessions export nothing.
   *
   * @throws {ExportError} If a source or command cannot be written
   */
  async exportShaders(options: { shaderLibrary?: string } = {}): Promise<void> {
    const scene = this.requireScene();
    if (scene.options.interactive) return;

    const base = deriveContext(this.sceneContext(scene), { window: 'SCENE', pass: this.passAt(this.activePass) });
    const pipelines = options.shaderLibrary
      ? [options.shaderLibrary]
      : [
          ...this.pipelines
            .listPipelines()
            .filter((pipeline) =>
              isTruthy(this.pipelines.getAttribute(base, pipeline, 'enabled', { resolve: true, default: 'True' }))
            ),
          EDITOR_PIPELINE,
        ];

    let library = 0;
    for (const pipeline of pipelines) {
      let targetPath: string;
      let compile: boolean;
      let info: boolean;

      if (options.shaderLibrary) {
        const directory = this.pipelines.getAttribute(base, pipeline, 'library', { resolve: true, default: '' });
        if (!directory) continue;
        targetPath = `${path.resolve(path.dirname(path.resolve(scene.projectPath)), directory)}/`;
        compile = parseFlag(
          this.pipelines.getAttribute(base, pipeline, 'compile', { resolve: true, default: 'False' }),
          `'compile' attribute of ${pipeline}`
        );
        info =
          scene.options.compileShaders &&
          parseFlag(
            this.pipelines.getAttribute(base, pipeline, 'build', { resolve: true, default: 'False' }),
            `'build' attribute of ${pipeline}`
          );
      } else {
        targetPath = exportRelativePath('SHD', pipeline);
        if (!(await this.writeShaderSources(scene, base, pipeline, targetPath))) continue;
        compile = true;
        info = scene.options.compileShaders;
      }

      library += 1;
      const context = deriveContext(base, { currentLibrary: library, targetPath, targetName: '' });
      if (compile) {
        await this.queueCommands('COMPILE', context, 'COMPILE_S@[EVAL:.currentLibrary:#####]@_C@[EVAL:.currentCommand:#####]@', {
          path: exportRelativePath('DIR'),
        });
      }
      if (info) {
        await this.queueCommands('INFO', context, 'INFO_S@[EVAL:.currentLibrary:#####]@_C@[EVAL:.currentCommand:#####]@', {
          path: exportRelativePath('DIR'),
          delayBuild: true,
        });
      }
    }
  }

  /**
   * Write the sources of one pipeline into its shader directory.
   *
   * Sources are (re)written when shaders are purged or the file is missing.
   * A pipeline without sources leaves no empty shader directory behind;
   * one that still holds files from an earlier export is kept.
   *
   * @returns Whether the pipeline has any shader sources
   */
  private async writeShaderSources(
    scene: SceneDescription,
    context: ExportContext,
    pipeline: string,
    targetPath: string
  ): Promise<boolean> {
    const directory = path.resolve(this.root, targetPath);
    const sources: { name: string; text: () => string }[] = [];

    if (pipeline === EDITOR_PIPELINE) {
      for (const text of scene.editorTexts) {
        const name = text.filepath ? path.basename(text.filepath) : text.name;
        if (SHADER_SOURCE_EXTENSIONS.has(path.extname(name))) {
          sources.push({ name, text: () => text.text });
        }
      }
    } else {
      const sourcesPath = `${pipeline}/shader_sources`;
      for (const element of this.pipelines.listElements(sourcesPath)) {
        const elementPath = `${sourcesPath}/${element}`;
        const filepath = this.pipelines.getAttribute(context, elementPath, 'filepath', { default: '' });
        const name = path.basename(filepath);
        if (!name) {
          throw new ExportError('shader source', elementPath, new Error('must specify filepath'));
        }
        sources.push({ name, text: () => this.pipelines.getText(context, elementPath) });
      }
    }

    try {
      if (sources.length === 0) {
        await removeEmptyDirectory(directory);
        return false;
      }
      await fs.mkdir(directory, { recursive: true });
      for (const source of sources) {
        const filePath = path.join(directory, source.name);
        if (scene.options.purgeShaders || !(await fileExists(filePath))) {
          await fs.writeFile(filePath, source.text());
        }
      }
    } catch (err) {
      throw new ExportError('shader sources', pipeline, new IOError('write', directory, toError(err)));
    }

    return true;
  }

  /**
   * Queue one OPTIMIZE command per enabled OPTIMIZE panel when textures are
   * optimised outside an interactive session.
   *
   * @throws {ExportError} If a command cannot be built
   */
  async exportTextures(): Promise<void> {
    const scene = this.requireScene();
    if (!scene.options.optimizeTextures || scene.options.interactive) return;

    const context = deriveContext(this.sceneContext(scene), {
      window: 'SCENE',
      pass: this.passAt(this.activePass),
      targetPath: exportRelativePath('TEX'),
      targetName: '',
    });
    await this.queueCommands('OPTIMIZE', context, 'OPTIMIZE_C@[EVAL:.currentCommand:#####]@', {
      path: exportRelativePath('DIR'),
    });
  }

  // ===========================================================================
  // Archives
  // ===========================================================================

  /**
   * Export every enabled pass whose range contains `frame`.
   *
   * Beauty passes add their output to the display list. Pass archives are
   * written unless archive export is disabled or only the active pass is
   * exported; interactive sessions always export the active pass. RENDER
   * and POSTRENDER commands are queued for each pass.
   *
   * @throws {ExportError} If a pass archive or command cannot be built
   */
  async exportArchives(options: { frame?: number } = {}): Promise<void> {
    const scene = this.requireScene();
    const frame = options.frame ?? scene.frameCurrent;
    const x = Math.trunc(scene.resolution.x * scene.resolution.percentage * 0.01);
    const y = Math.trunc(scene.resolution.y * scene.resolution.percentage * 0.01);

    let exportArchive = scene.options.exportArchives;
    let activeOnly = scene.options.activePassOnly;
    if (scene.options.interactive) {
      exportArchive = true;
      activeOnly = true;
    }

    this.frame = frame;
    this.display = { x, y, passes: [] };

    const archivePath = exportRelativePath('FRA');
    for (const pass of this.passes) {
      if (!pass.enabled || !frameInRange(frame, pass)) continue;

      const context = deriveContext(this.sceneContext(scene), {
        window: 'RENDER',
        pass,
        currentPass: pass.index,
        currentFrame: frame,
        resX: x,
        resY: y,
      });
      const archiveName = resolveLinks(PASS_ARCHIVE_NAME, context, 'pass archive name');

      if (pass.type === 'BEAUTY') {
        this.display.passes.push({
          file: resolveLinks(pass.output, context, `output of pass '${pass.name}'`),
          layer: pass.layer,
          multilayer: pass.multilayer,
        });
      }

      if (exportArchive && (!activeOnly || pass.index === this.activePass)) {
        try {
          await writePassArchive(this.pipelines, context, {
            path: archivePath,
            name: archiveName,
            gzip: scene.options.compressArchives,
            world: scene.world,
            geometry: this.options.geometry,
          });
        } catch (err) {
          throw new ExportError(`archive ${archiveName}`, '', toError(err));
        }
      }

      const renderCount = await this.queueCommands(
        'RENDER',
        deriveContext(context, { targetPath: archivePath, targetName: archiveName }),
        'RENDER_P@[EVAL:.currentPass:#####]@_F@[EVAL:.currentFrame:#####]@_C@[EVAL:.currentCommand:#####]@',
        { path: exportRelativePath('DIR') }
      );
      await this.queueCommands(
        'POSTRENDER',
        deriveContext(context, { targetPath: '', targetName: '', currentCommand: renderCount }),
        'POSTRENDER_P@[EVAL:.currentPass:#####]@_F@[EVAL:.currentFrame:#####]@_C@[EVAL:.currentCommand:#####]@',
        { path: exportRelativePath('DIR') }
      );
    }
  }

  /**
   * Build one command per enabled command panel of `category`.
   *
   * The command counter continues from `context.currentCommand`.
   *
   * @returns The last command index used
   * @throws {ExportError} If a command cannot be built
   */
  private async queueCommands(
    category: CommandCategory,
    context: ExportContext,
    namePattern: string,
    init: { path: string; delayBuild?: boolean }
  ): Promise<number> {
    let counter = context.currentCommand;

    for (const panel of this.pipelines.listPanels('command_panels', { type: category })) {
      const scoped = panelContext(context, panel);
      if (!this.pipelines.isPanelEnabled(scoped, panel)) continue;

      counter += 1;
      const commandContext = deriveContext(scoped, { currentCommand: counter });
      const name = resolveLinks(namePattern, commandContext, 'command name');
      try {
        const command = await Command.create(this.pipelines, commandContext, {
          template: panel,
          category,
          path: init.path,
          name,
          delayBuild: init.delayBuild ?? false,
        });
        this.buckets[category].push(command);
      } catch (err) {
        throw new ExportError(`command ${name}`, panel, toError(err));
      }
    }

    return counter;
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Execute the queued commands in category order.
   *
   * Categories run only when enabled by the scene's options: OPTIMIZE by
   * `optimizeTextures`, COMPILE and INFO by `compileShaders`, RENDER and
   * POSTRENDER by `renderArchives` (always in interactive sessions). Every
   * queued command is appended to the launcher except INFO commands that were
   * never built. Drained buckets are cleared unless interactive.
   *
   * @returns One result per queued command
   * @throws {ExportAbortedError} If the signal is aborted; the terminated command stays queued
   * @throws {ProcessError} If a command exits non-zero and `stopOnFailure` is set
   * @throws {ExportError} If a command fails to build or spawn
   */
  async executeCommands(options: ExecuteCommandsOptions = {}): Promise<CommandExecutionResult[]> {
    const scene = this.requireScene();
    const interactive = scene.options.interactive;
    const enabled: Record<CommandCategory, boolean> = {
      OPTIMIZE: scene.options.optimizeTextures,
      COMPILE: scene.options.compileShaders,
      INFO: scene.options.compileShaders,
      RENDER: scene.options.renderArchives || interactive,
      POSTRENDER: scene.options.renderArchives || interactive,
    };

    const launcher = Archive.create(this.pipelines, deriveContext(emptyContext(), { rootPath: this.root }), {
      path: exportRelativePath('DIR'),
      name: LAUNCHER_NAME,
    });
    await launcher.open({ executable: true, mode: 'a' });

    const results: CommandExecutionResult[] = [];
    try {
      for (const category of CommandCategories) {
        const bucket = this.buckets[category];

        for (const command of bucket) {
          if (options.signal?.aborted) {
            throw new ExportAbortedError(results);
          }

          const startTime = Date.now();
          const executed = enabled[category];
          if (executed) {
            this.options.onCommandStart?.(command);
            try {
              await command.execute({
                interactive,
                signal: options.signal,
                onStdout: (data) => this.options.onStdout?.(command, data),
                onStderr: (data) => this.options.onStderr?.(command, data),
              });
            } catch (err) {
              await this.forceClose(command);
              throw new ExportError(`command ${command.name}`, command.template, toError(err));
            }
          }

          if (!(category === 'INFO' && command.state === 'building')) {
            await launcher.write(`${command.invocation}\n`);
          }

          const result: CommandExecutionResult = {
            name: command.name,
            category,
            state: command.state,
            executed,
            exitCode: command.exitCode,
            duration: Date.now() - startTime,
          };
          results.push(result);
          if (executed) this.options.onCommandComplete?.(command, result);

          if (command.state === 'terminated') {
            throw new ExportAbortedError(results);
          }
          if (options.stopOnFailure && command.exitCode !== null && command.exitCode !== 0) {
            throw new ProcessError(command.name, `exited with code ${command.exitCode}`, command.exitCode);
          }
        }

        if (!interactive) {
          for (const command of bucket) await command.close();
          bucket.length = 0;
        }
      }
    } finally {
      await launcher.close();
    }

    return results;
  }

  /**
   * Close every queued command.
   */
  async dispose(): Promise<void> {
    await this.clearCommands();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async clearCommands(): Promise<void> {
    for (const category of CommandCategories) {
      const bucket = this.buckets[category];
      for (const command of bucket) await this.forceClose(command);
      bucket.length = 0;
    }
  }

  private async forceClose(command: Command): Promise<void> {
    try {
      await command.close();
    } catch (err) {
      console.warn(`Failed to close command '${command.name}': ${toError(err).message}`);
    }
  }

  private requireScene(): SceneDescription {
    if (!this.scene) {
      throw new DirectoryError('', new Error('prepareExport() has not been called'));
    }
    return this.scene;
  }

  private passAt(index: number): PassSnapshot | null {
    return this.passes[index - 1] ?? null;
  }

  private sceneContext(scene: SceneDescription): ExportContext {
    return sceneContext(scene, { rootPath: this.root, environment: this.environment });
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

async function removeEmptyDirectory(directory: string): Promise<void> {
  try {
    await fs.rmdir(directory);
  } catch (err) {
    if (isNotFoundError(err) || isNotEmptyError(err)) return;
    throw err;
  }
}
