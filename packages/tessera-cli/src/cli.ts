#!/usr/bin/env -S node --import tsx

/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * tessera CLI - export pipeline templates into archives and command scripts
 *
 * Documents are named by `--pipeline` and `--scene`, or by the
 * TESSERA_PIPELINE and TESSERA_SCENE environment variables.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { exportCommand } from './commands/export.js';
import { prepareCommand } from './commands/prepare.js';
import { resolveCommand } from './commands/resolve.js';
import { panelsCommand } from './commands/panels.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

const program = new Command();

program
  .name('tessera')
  .description('Generate scene archives and command scripts from pipeline templates')
  .version(packageJson.version);

program
  .command('export [frames]')
  .description('Export frames (N, N-M or a list; default: current frame) and run their commands')
  .option('--pipeline <file>', 'Pipeline document (default: $TESSERA_PIPELINE)')
  .option('--scene <file>', 'Scene document (default: $TESSERA_SCENE)')
  .option('--no-execute', 'Generate commands without running them')
  .option('--stop-on-failure', 'Stop at the first command that exits non-zero')
  .action(exportCommand);

program
  .command('prepare')
  .description('Prepare the export directory tree')
  .option('--pipeline <file>', 'Pipeline document (default: $TESSERA_PIPELINE)')
  .option('--scene <file>', 'Scene document (default: $TESSERA_SCENE)')
  .option('--clean <keys>', 'Directories whose files are removed (default: DIR)')
  .option('--purge <keys>', 'Directories whose contents are removed (default: TMP)')
  .action(prepareCommand);

program
  .command('resolve <template>')
  .description("Resolve a template against the scene's active pass")
  .option('--scene <file>', 'Scene document (default: $TESSERA_SCENE)')
  .option('--frame <n>', 'Frame in scope (default: current frame)')
  .action(resolveCommand);

program
  .command('panels <kind>')
  .description('List panels (command_panels, utility_panels or shader_panels)')
  .option('--pipeline <file>', 'Pipeline document (default: $TESSERA_PIPELINE)')
  .option('--scene <file>', 'Scene document (default: $TESSERA_SCENE)')
  .option('--type <category>', 'Only command panels of this category')
  .option('--window <window>', 'Only panels of this window')
  .action(panelsCommand);

program.parse();
