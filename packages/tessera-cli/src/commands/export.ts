/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * tessera export command - Export frames and run their commands
 *
 * Usage:
 *   tessera export
 *   tessera export 1-10 --scene shot.json --pipeline pipelines.json
 *   tessera export 1,3,5 --no-execute
 */

import {
  ExportAbortedError,
  Exporter,
  StaticSceneProvider,
  type CommandExecutionResult,
} from '@tessera/core';
import { exitError, formatError, loadDocuments, log, parseFrames, type DocumentOptions } from '../utils.js';

interface Summary {
  executed: number;
  skipped: number;
  failed: number;
}

/**
 * Export frames, executing the queued commands after each frame.
 */
export async function exportCommand(
  frames: string | undefined,
  options: DocumentOptions & { execute: boolean; stopOnFailure?: boolean }
): Promise<void> {
  try {
    const { pipelines, scene } = await loadDocuments(options);
    const frameList = frames ? parseFrames(frames) : [scene.frameCurrent];

    const exporter = new Exporter(pipelines, new StaticSceneProvider(scene), {
      onCommandStart: (command) => {
        log(`[START] ${command.name}`);
      },
      onCommandComplete: (_command, result) => {
        log(`[${formatStatus(result)}] ${result.name} [${result.duration}ms]`);
      },
      onStdout: (_command, data) => {
        process.stdout.write(data);
      },
      onStderr: (_command, data) => {
        process.stderr.write(data);
      },
    });

    const controller = new AbortController();
    const onSigint = () => {
      log('Interrupted, terminating the running command');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    const summary: Summary = { executed: 0, skipped: 0, failed: 0 };
    try {
      await exporter.prepareExport();
      log(`Exporting to ${exporter.exportDirectory}`);

      await exporter.exportShaders();
      await exporter.exportTextures();

      for (const frame of frameList) {
        log(`Frame ${frame}`);
        await exporter.exportArchives({ frame });
        for (const pass of exporter.displayOutput.passes) {
          if (pass.file) log(`  Output: ${pass.file}`);
        }

        if (options.execute) {
          const results = await exporter.executeCommands({
            signal: controller.signal,
            stopOnFailure: options.stopOnFailure,
          });
          tally(summary, results);
        }
      }
    } catch (err) {
      if (err instanceof ExportAbortedError) {
        tally(summary, err.partialResults);
        printSummary(summary);
      }
      throw err;
    } finally {
      process.off('SIGINT', onSigint);
      await exporter.dispose();
    }

    printSummary(summary);
    if (summary.failed > 0) {
      process.exit(1);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}

function tally(summary: Summary, results: readonly CommandExecutionResult[]): void {
  for (const result of results) {
    if (!result.executed) {
      summary.skipped += 1;
    } else {
      summary.executed += 1;
      if (isFailure(result)) summary.failed += 1;
    }
  }
}

function isFailure(result: CommandExecutionResult): boolean {
  return result.state === 'terminated' || (result.exitCode !== null && result.exitCode !== 0);
}

function printSummary(summary: Summary): void {
  console.log('');
  console.log('Summary:');
  console.log(`  Executed: ${summary.executed}`);
  console.log(`  Skipped:  ${summary.skipped}`);
  console.log(`  Failed:   ${summary.failed}`);
}

function formatStatus(result: CommandExecutionResult): string {
  switch (result.state) {
    case 'completed':
      return isFailure(result) ? 'FAIL' : 'DONE';
    case 'terminated':
      return 'KILL';
    case 'executing':
      return 'BG';
    default:
      return '???';
  }
}
