/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for exporter.ts
 *
 * Each test exports into its own temporary directory. Command panels generate
 * short POSIX shell scripts.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs';
import { join } from 'node:path';
import type { PipelineElementInput, SceneDescription } from '@tessera/types';
import { StaticSceneProvider } from './documents.js';
import { DirectoryError, DirtyStateError, ExportAbortedError, ExportError, ProcessError } from './errors.js';
import { Exporter, LAUNCHER_NAME, sceneContext } from './exporter.js';
import type { DocumentPipelineStore } from './pipelineStore.js';
import { createTempDir, removeTempDir, testPipelines, testScene } from './test-helpers.js';

function commandPanel(type: string, middle: string, attributes: Record<string, string> = {}): PipelineElementInput {
  return {
    attributes: { type, extension: '.sh', ...attributes },
    elements: {
      begin: { text: '#!/bin/sh\n' },
      middle: { text: middle },
    },
  };
}

function files(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

describe('Exporter', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  const exporter = (pipelines: DocumentPipelineStore, scene: SceneDescription) =>
    new Exporter(pipelines, new StaticSceneProvider(scene), { environment: {} });

  describe('sceneContext', () => {
    it('scopes the scene attributes', () => {
      const scene = testScene(root, { frameCurrent: 7, attributes: { shot: 'sh010' } });
      const context = sceneContext(scene, { rootPath: '/out', environment: { HOME: '/home/test' } });
      assert.strictEqual(context.rootPath, '/out');
      assert.strictEqual(context.currentFrame, 7);
      assert.deepStrictEqual(context.datablock, { shot: 'sh010' });
      assert.deepStrictEqual(context.scene, { shot: 'sh010' });
      assert.deepStrictEqual(context.environment, { HOME: '/home/test' });
    });
  });

  describe('prepareExport', () => {
    it('rejects unsaved projects', async () => {
      const scene = testScene(root, { dirty: true });
      await assert.rejects(() => exporter(testPipelines({}), scene).prepareExport(), DirtyStateError);
    });

    it('rejects projects without a project path', async () => {
      const scene = testScene(root, { projectPath: '' });
      await assert.rejects(() => exporter(testPipelines({}), scene).prepareExport(), DirtyStateError);
    });

    it('rejects an empty export path', async () => {
      const scene = testScene('', { projectPath: join(root, 'project.json') });
      await assert.rejects(() => exporter(testPipelines({}), scene).prepareExport(), DirectoryError);
    });

    it('resolves paths relative to the project', async () => {
      const scene = testScene('//renders/@[EVAL:.datablock.shot]@', {
        projectPath: join(root, 'project.json'),
        attributes: { shot: 'sh010' },
      });
      const instance = exporter(testPipelines({}), scene);
      await instance.prepareExport();
      assert.strictEqual(instance.exportDirectory, join(root, 'renders', 'sh010'));
      assert.ok(fs.statSync(join(root, 'renders', 'sh010', 'Archives', 'Objects', 'Geometry')).isDirectory());
    });

    it('cleans root files but leaves other directories untouched', async () => {
      const instance = exporter(testPipelines({}), testScene(root));
      await instance.prepareExport();
      fs.writeFileSync(join(root, LAUNCHER_NAME), './old.sh\n');
      fs.writeFileSync(join(root, 'Renders', 'image.tif'), '');
      fs.mkdirSync(join(root, 'Shaders', 'Basic'));
      fs.writeFileSync(join(root, 'Shaders', 'Basic', 'a.sl'), '');

      await instance.prepareExport({ clean: ['DIR'] });

      assert.strictEqual(fs.existsSync(join(root, LAUNCHER_NAME)), false);
      assert.strictEqual(fs.existsSync(join(root, 'Renders', 'image.tif')), true);
      assert.strictEqual(fs.existsSync(join(root, 'Shaders', 'Basic', 'a.sl')), true);
    });

    it('never deletes anything in interactive sessions', async () => {
      await exporter(testPipelines({}), testScene(root)).prepareExport();
      fs.writeFileSync(join(root, LAUNCHER_NAME), './old.sh\n');
      fs.writeFileSync(join(root, 'Cache', 'c.bin'), '');
      fs.writeFileSync(join(root, 'Archives', 'P00001_F00001.rib'), '');

      const scene = testScene(root, { options: { interactive: true, purgeArchives: true, purgeShaders: true } });
      await exporter(testPipelines({}), scene).prepareExport({ clean: ['DIR', 'FRA'], purge: ['TMP'] });

      assert.strictEqual(fs.existsSync(join(root, LAUNCHER_NAME)), true);
      assert.strictEqual(fs.existsSync(join(root, 'Cache', 'c.bin')), true);
      assert.strictEqual(fs.existsSync(join(root, 'Archives', 'P00001_F00001.rib')), true);
    });

    it('cleans archive directories when archives are purged', async () => {
      await exporter(testPipelines({}), testScene(root)).prepareExport();
      fs.writeFileSync(join(root, 'Archives', 'P00001_F00001.rib'), '');
      fs.writeFileSync(join(root, 'Archives', 'Objects', 'o.rib'), '');

      await exporter(testPipelines({}), testScene(root, { options: { purgeArchives: true } })).prepareExport();

      assert.deepStrictEqual(files(join(root, 'Archives')), []);
      assert.deepStrictEqual(files(join(root, 'Archives', 'Objects')), []);
    });
  });

  describe('exportArchives', () => {
    it('writes one archive for one beauty pass without commands', async () => {
      const instance = exporter(testPipelines({}), testScene(root));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      assert.deepStrictEqual(files(join(root, 'Archives')), ['P00001_F00001.rib']);
      assert.strictEqual(
        fs.readFileSync(join(root, 'Archives', 'P00001_F00001.rib'), 'utf-8'),
        'FrameBegin 1\nFormat 1920 1080 1\nWorldBegin\nWorldEnd\nFrameEnd\n'
      );
      for (const category of ['OPTIMIZE', 'COMPILE', 'INFO', 'RENDER', 'POSTRENDER'] as const) {
        assert.strictEqual(instance.commands(category).length, 0, category);
      }
      assert.strictEqual(instance.exportFrame, 1);
    });

    it('composes panels and geometry into the pass archive', async () => {
      const pipelines = testPipelines({
        Basic: {
          elements: {
            utility_panels: {
              elements: {
                options: {
                  attributes: { window: 'SCENE' },
                  elements: { begin: { text: '# scene @[EVAL:.panel]@\n' }, end: { text: '# done\n' } },
                },
                camera: {
                  attributes: { window: 'RENDER' },
                  elements: { begin: { text: 'Projection "perspective"\n' } },
                },
                sky: {
                  attributes: { window: 'WORLD' },
                  elements: { begin: { text: 'AttributeBegin # @[EVAL:.datablock.name]@\n' }, end: { text: 'AttributeEnd\n' } },
                },
              },
            },
            shader_panels: {
              elements: {
                ambient: { attributes: { window: 'WORLD' }, elements: { rib: { text: 'LightSource "ambientlight" 1\n' } } },
              },
            },
          },
        },
      });
      const scene = testScene(root, {
        resolution: { x: 640, y: 480, percentage: 50 },
        world: { name: 'World' },
        passes: [{ name: 'Main', samplesX: 4, samplesY: 2, shadingRate: 0.5 }],
      });
      const instance = new Exporter(pipelines, new StaticSceneProvider(scene), {
        environment: {},
        geometry: { worldText: (ctx) => `Sphere 1 -1 1 360 # pass @[EVAL:.currentPass]@ ${ctx.currentPass}\n` },
      });
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      assert.strictEqual(
        fs.readFileSync(join(root, 'Archives', 'P00001_F00001.rib'), 'utf-8'),
        [
          '# scene options',
          'FrameBegin 1',
          'Projection "perspective"',
          'Format 320 240 1',
          'PixelSamples 4 2',
          'ShadingRate 0.5',
          'WorldBegin',
          'AttributeBegin # World',
          'LightSource "ambientlight" 1',
          'Sphere 1 -1 1 360 # pass @[EVAL:.currentPass]@ 1',
          'AttributeEnd',
          'WorldEnd',
          'FrameEnd',
          '# done',
          '',
        ].join('\n')
      );
    });

    it('compresses archives when asked', async () => {
      const instance = exporter(testPipelines({}), testScene(root, { options: { compressArchives: true } }));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });
      const data = fs.readFileSync(join(root, 'Archives', 'P00001_F00001.rib'));
      assert.strictEqual(data[0], 0x1f);
      assert.strictEqual(data[1], 0x8b);
    });

    it('exports passes whose range contains the frame', async () => {
      const scene = testScene(root, {
        frameEnd: 10,
        passes: [
          { name: 'Main', output: '@[EVAL:.pass.name]@_@[EVAL:.currentFrame:####]@.tif', layer: 'rgba' },
          { name: 'Shadow', type: 'SHADOW', rangeStart: 1, rangeEnd: 10, rangeStep: 2 },
          { name: 'Off', enabled: false },
        ],
      });
      const instance = exporter(testPipelines({}), scene);
      await instance.prepareExport();

      await instance.exportArchives({ frame: 4 });
      assert.deepStrictEqual(files(join(root, 'Archives')), ['P00001_F00004.rib']);
      assert.deepStrictEqual(instance.displayOutput, {
        x: 1920,
        y: 1080,
        passes: [{ file: 'Main_0004.tif', layer: 'rgba', multilayer: false }],
      });

      await instance.exportArchives({ frame: 5 });
      assert.deepStrictEqual(files(join(root, 'Archives')), ['P00001_F00004.rib', 'P00001_F00005.rib', 'P00002_F00005.rib']);
    });

    it('exports only the active pass when asked', async () => {
      const scene = testScene(root, {
        passes: [{ name: 'Main' }, { name: 'Key', type: 'SHADOW' }],
        activePass: 1,
        options: { activePassOnly: true },
      });
      const instance = exporter(testPipelines({}), scene);
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });
      assert.deepStrictEqual(files(join(root, 'Archives')), ['P00002_F00001.rib']);
      assert.strictEqual(instance.displayOutput.passes.length, 1);
    });

    it('skips archives when archive export is disabled', async () => {
      const instance = exporter(testPipelines({}), testScene(root, { options: { exportArchives: false } }));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });
      assert.deepStrictEqual(files(join(root, 'Archives')), []);
    });

    it('exports the active pass in interactive sessions', async () => {
      const scene = testScene(root, {
        passes: [{ name: 'Main' }, { name: 'Key', type: 'SHADOW' }],
        activePass: 1,
        options: { interactive: true, exportArchives: false },
      });
      const instance = exporter(testPipelines({}), scene);
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });
      assert.deepStrictEqual(files(join(root, 'Archives')), ['P00002_F00001.rib']);
    });

    it('names the failing archive', async () => {
      const pipelines = testPipelines({
        Basic: {
          elements: {
            utility_panels: {
              elements: { bad: { attributes: { window: 'SCENE' }, elements: { begin: { text: '@[EVAL:.datablock.nope]@' } } } },
            },
          },
        },
      });
      const instance = exporter(pipelines, testScene(root));
      await instance.prepareExport();
      await assert.rejects(
        () => instance.exportArchives({ frame: 1 }),
        (err: unknown) => err instanceof ExportError && err.unit === 'archive P00001_F00001.rib'
      );
    });
  });

  describe('commands', () => {
    const renderPipelines = () =>
      testPipelines({
        Basic: {
          elements: {
            command_panels: {
              elements: {
                render: commandPanel('RENDER', 'echo @[EVAL:.targetPath]@@[EVAL:.targetName]@ >> rendered.txt\n'),
                post: commandPanel('POSTRENDER', 'echo post @[EVAL:.currentCommand]@ >> rendered.txt\n'),
                off: commandPanel('RENDER', 'exit 1\n', { enabled: 'False' }),
              },
            },
          },
        },
      });

    it('queues, runs and records RENDER and POSTRENDER commands', async () => {
      const instance = exporter(renderPipelines(), testScene(root));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      assert.deepStrictEqual(
        instance.commands('RENDER').map((command) => command.name),
        ['RENDER_P00001_F00001_C00001.sh']
      );
      assert.deepStrictEqual(
        instance.commands('POSTRENDER').map((command) => command.name),
        ['POSTRENDER_P00001_F00001_C00002.sh']
      );

      const results = await instance.executeCommands();

      assert.deepStrictEqual(
        results.map((result) => [result.name, result.category, result.state, result.executed, result.exitCode]),
        [
          ['RENDER_P00001_F00001_C00001.sh', 'RENDER', 'completed', true, 0],
          ['POSTRENDER_P00001_F00001_C00002.sh', 'POSTRENDER', 'completed', true, 0],
        ]
      );
      assert.strictEqual(fs.readFileSync(join(root, 'rendered.txt'), 'utf-8'), './Archives/P00001_F00001.rib\npost 2\n');
      assert.strictEqual(
        fs.readFileSync(join(root, LAUNCHER_NAME), 'utf-8'),
        './RENDER_P00001_F00001_C00001.sh\n./POSTRENDER_P00001_F00001_C00002.sh\n'
      );
      assert.strictEqual(instance.commands('RENDER').length, 0);
      assert.strictEqual(instance.commands('POSTRENDER').length, 0);
    });

    it('lists disabled categories in the launcher without running them', async () => {
      const instance = exporter(renderPipelines(), testScene(root, { options: { renderArchives: false } }));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      const results = await instance.executeCommands();

      assert.deepStrictEqual(results.map((result) => result.executed), [false, false]);
      assert.strictEqual(fs.existsSync(join(root, 'rendered.txt')), false);
      assert.strictEqual(
        fs.readFileSync(join(root, LAUNCHER_NAME), 'utf-8'),
        './RENDER_P00001_F00001_C00001.sh\n./POSTRENDER_P00001_F00001_C00002.sh\n'
      );
    });

    it('reports command progress through callbacks', async () => {
      const started: string[] = [];
      const completed: string[] = [];
      const instance = new Exporter(renderPipelines(), new StaticSceneProvider(testScene(root)), {
        environment: {},
        onCommandStart: (command) => started.push(command.name),
        onCommandComplete: (command, result) => completed.push(`${command.name}:${result.state}`),
      });
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });
      await instance.executeCommands();

      assert.deepStrictEqual(started, ['RENDER_P00001_F00001_C00001.sh', 'POSTRENDER_P00001_F00001_C00002.sh']);
      assert.deepStrictEqual(completed, [
        'RENDER_P00001_F00001_C00001.sh:completed',
        'POSTRENDER_P00001_F00001_C00002.sh:completed',
      ]);
    });

    it('raises on a non-zero exit when stopping on failure', async () => {
      const pipelines = testPipelines({
        Basic: { elements: { command_panels: { elements: { render: commandPanel('RENDER', 'exit 2\n') } } } },
      });
      const instance = exporter(pipelines, testScene(root));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      await assert.rejects(
        () => instance.executeCommands({ stopOnFailure: true }),
        (err: unknown) => err instanceof ProcessError && err.exitCode === 2
      );
      assert.strictEqual(fs.readFileSync(join(root, LAUNCHER_NAME), 'utf-8'), './RENDER_P00001_F00001_C00001.sh\n');
      await instance.dispose();
    });

    it('keeps the terminated command queued when aborted', async () => {
      const pipelines = testPipelines({
        Basic: {
          elements: {
            command_panels: {
              elements: {
                render: commandPanel('RENDER', 'echo started\nsleep 10\n'),
                post: commandPanel('POSTRENDER', 'echo post > post.txt\n'),
              },
            },
          },
        },
      });
      const controller = new AbortController();
      const instance = new Exporter(pipelines, new StaticSceneProvider(testScene(root)), {
        environment: {},
        onStdout: () => controller.abort(),
      });
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      await assert.rejects(
        () => instance.executeCommands({ signal: controller.signal }),
        (err: unknown) =>
          err instanceof ExportAbortedError &&
          err.partialResults.length === 1 &&
          err.partialResults[0]?.state === 'terminated'
      );
      assert.deepStrictEqual(
        instance.commands('RENDER').map((command) => command.state),
        ['terminated']
      );
      assert.strictEqual(instance.commands('POSTRENDER').length, 1);
      assert.strictEqual(fs.existsSync(join(root, 'post.txt')), false);

      await instance.dispose();
      assert.strictEqual(instance.commands('RENDER').length, 0);
    });

    it('returns while interactive commands still run and keeps them queued', async () => {
      const pipelines = testPipelines({
        Basic: { elements: { command_panels: { elements: { render: commandPanel('RENDER', 'sleep 1\n') } } } },
      });
      const scene = testScene(root, { options: { interactive: true, renderArchives: false } });
      const instance = exporter(pipelines, scene);
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });

      const results = await instance.executeCommands();

      assert.deepStrictEqual(
        results.map((result) => [result.name, result.state, result.executed, result.exitCode]),
        [['RENDER_P00001_F00001_C00001.sh', 'executing', true, null]]
      );
      assert.deepStrictEqual(
        instance.commands('RENDER').map((command) => command.state),
        ['executing']
      );
      assert.strictEqual(fs.readFileSync(join(root, LAUNCHER_NAME), 'utf-8'), './RENDER_P00001_F00001_C00001.sh\n');

      await instance.dispose();
      assert.strictEqual(instance.commands('RENDER').length, 0);
    });

    it('closes queued commands when preparing again', async () => {
      const instance = exporter(renderPipelines(), testScene(root));
      await instance.prepareExport();
      await instance.exportArchives({ frame: 1 });
      const [command] = instance.commands('RENDER');

      await instance.prepareExport();

      assert.strictEqual(command?.state, 'closed');
      assert.strictEqual(instance.commands('RENDER').length, 0);
    });
  });

  describe('exportShaders', () => {
    const shaderPipelines = () =>
      testPipelines({
        Basic: {
          attributes: { library: './lib', compile: 'True', build: 'True' },
          elements: {
            shader_sources: {
              elements: {
                plastic: { attributes: { filepath: 'shaders/plastic.sl' }, text: 'surface plastic() {}\n' },
              },
            },
            command_panels: {
              elements: {
                compile: commandPanel('COMPILE', 'echo compile @[EVAL:.targetPath]@ >> compiled.txt\n'),
                info: commandPanel('INFO', 'echo info @[EVAL:.currentLibrary]@ >> compiled.txt\n'),
              },
            },
          },
        },
      });

    it('writes sources and queues commands per library', async () => {
      const scene = testScene(root, {
        editorTexts: [
          { name: 'glow.sl', text: 'surface glow() {}\n' },
          { name: 'notes.txt', text: 'not a shader' },
        ],
        options: { compileShaders: true },
      });
      const instance = exporter(shaderPipelines(), scene);
      await instance.prepareExport();
      await instance.exportShaders();

      assert.strictEqual(fs.readFileSync(join(root, 'Shaders', 'Basic', 'plastic.sl'), 'utf-8'), 'surface plastic() {}\n');
      assert.deepStrictEqual(files(join(root, 'Shaders', 'Editor')), ['glow.sl']);
      assert.deepStrictEqual(
        instance.commands('COMPILE').map((command) => command.name),
        ['COMPILE_S00001_C00001.sh', 'COMPILE_S00002_C00001.sh']
      );
      assert.deepStrictEqual(
        instance.commands('INFO').map((command) => [command.name, command.state]),
        [
          ['INFO_S00001_C00001.sh', 'building'],
          ['INFO_S00002_C00001.sh', 'building'],
        ]
      );

      await instance.executeCommands();
      assert.strictEqual(
        fs.readFileSync(join(root, 'compiled.txt'), 'utf-8'),
        'compile ./Shaders/Basic/\ncompile ./Shaders/Editor/\ninfo 1\ninfo 2\n'
      );
    });

    it('skips INFO commands unless shaders are compiled and removes empty shader directories', async () => {
      const instance = exporter(shaderPipelines(), testScene(root));
      await instance.prepareExport();
      await instance.exportShaders();

      assert.deepStrictEqual(
        instance.commands('COMPILE').map((command) => command.name),
        ['COMPILE_S00001_C00001.sh']
      );
      assert.strictEqual(instance.commands('INFO').length, 0);
      assert.strictEqual(fs.existsSync(join(root, 'Shaders', 'Editor')), false);
      await instance.dispose();
    });

    it('keeps a shader directory that still holds files', async () => {
      const first = exporter(shaderPipelines(), testScene(root, { editorTexts: [{ name: 'glow.sl', text: 'surface glow() {}\n' }] }));
      await first.prepareExport();
      await first.exportShaders();
      await first.dispose();
      fs.writeFileSync(join(root, 'Shaders', 'Editor', 'glow.slo'), '');

      const instance = exporter(shaderPipelines(), testScene(root));
      await instance.prepareExport();
      await instance.exportShaders();

      assert.deepStrictEqual(files(join(root, 'Shaders', 'Editor')), ['glow.sl', 'glow.slo']);
      assert.deepStrictEqual(
        instance.commands('COMPILE').map((command) => command.name),
        ['COMPILE_S00001_C00001.sh']
      );
      await instance.dispose();
    });

    it('keeps existing sources unless shaders are purged', async () => {
      const instance = exporter(shaderPipelines(), testScene(root));
      await instance.prepareExport();
      fs.mkdirSync(join(root, 'Shaders', 'Basic'));
      fs.writeFileSync(join(root, 'Shaders', 'Basic', 'plastic.sl'), 'edited\n');

      await instance.exportShaders();

      assert.strictEqual(fs.readFileSync(join(root, 'Shaders', 'Basic', 'plastic.sl'), 'utf-8'), 'edited\n');
      await instance.dispose();
    });

    it('exports nothing in interactive sessions', async () => {
      const instance = exporter(shaderPipelines(), testScene(root, { options: { interactive: true } }));
      await instance.prepareExport();
      await instance.exportShaders();
      assert.strictEqual(instance.commands('COMPILE').length, 0);
      assert.deepStrictEqual(fs.readdirSync(join(root, 'Shaders')), []);
    });

    it('compiles a shader library from its own directory', async () => {
      const scene = testScene(root, { options: { compileShaders: true } });
      const instance = exporter(shaderPipelines(), scene);
      await instance.prepareExport({ shaderLibrary: 'Basic' });
      await instance.exportShaders({ shaderLibrary: 'Basic' });
      await instance.executeCommands();

      assert.strictEqual(
        fs.readFileSync(join(root, 'compiled.txt'), 'utf-8'),
        `compile ${join(root, 'lib')}/\ninfo 1\n`
      );
      assert.strictEqual(fs.existsSync(join(root, 'Shaders', 'Basic')), false);
    });

    it('rejects shader sources without a file path', async () => {
      const pipelines = testPipelines({
        Basic: { elements: { shader_sources: { elements: { bad: { text: 'surface bad() {}' } } } } },
      });
      const instance = exporter(pipelines, testScene(root));
      await instance.prepareExport();
      await assert.rejects(
        () => instance.exportShaders(),
        (err: unknown) => err instanceof ExportError && err.template === 'Basic/shader_sources/bad'
      );
    });
  });

  describe('exportTextures', () => {
    const texturePipelines = () =>
      testPipelines({
        Basic: {
          elements: {
            command_panels: {
              elements: { optimize: commandPanel('OPTIMIZE', 'echo @[EVAL:.targetPath]@ > optimized.txt\n') },
            },
          },
        },
      });

    it('queues OPTIMIZE commands when optimising textures', async () => {
      const instance = exporter(texturePipelines(), testScene(root, { options: { optimizeTextures: true } }));
      await instance.prepareExport();
      await instance.exportTextures();

      assert.deepStrictEqual(
        instance.commands('OPTIMIZE').map((command) => command.name),
        ['OPTIMIZE_C00001.sh']
      );
      await instance.executeCommands();
      assert.strictEqual(fs.readFileSync(join(root, 'optimized.txt'), 'utf-8'), './Textures/\n');
    });

    it('queues nothing otherwise', async () => {
      const instance = exporter(texturePipelines(), testScene(root));
      await instance.prepareExport();
      await instance.exportTextures();
      assert.strictEqual(instance.commands('OPTIMIZE').length, 0);
    });
  });
});
