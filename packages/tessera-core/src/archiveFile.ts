/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Physical archive files.
 *
 * An ArchiveFile is the one open handle behind a tree of composed archive
 * writers. Plain files are written through a FileHandle; gzip files stream
 * through zlib into a write stream.
 */

import * as fs from 'fs/promises';
import { createWriteStream } from 'fs';
import { once } from 'events';
import { pipeline } from 'stream/promises';
import { createGzip, gunzipSync, gzipSync, type Gzip } from 'zlib';
import { IOError, toError } from './errors.js';

/** File open mode: write (truncate), append or read */
export type ArchiveMode = 'w' | 'a' | 'r';

/** Permission bits of executable archives (rwxr-xr-x) */
export const EXECUTABLE_MODE = 0o755;

export interface ArchiveFileOptions {
  gzip: boolean;
  executable: boolean;
  mode: ArchiveMode;
}

interface Sink {
  write(data: string): Promise<void>;
  close(): Promise<void>;
}

class PlainSink implements Sink {
  constructor(private readonly handle: fs.FileHandle) {}

  async write(data: string): Promise<void> {
    await this.handle.write(data);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

class GzipSink implements Sink {
  constructor(
    private readonly gzip: Gzip,
    private readonly done: Promise<Error | null>
  ) {}

  async write(data: string): Promise<void> {
    if (!this.gzip.write(Buffer.from(data, 'utf-8'))) {
      await once(this.gzip, 'drain');
    }
  }

  async close(): Promise<void> {
    this.gzip.end();
    const err = await this.done;
    if (err) throw err;
  }
}

/**
 * An open (or closed) physical archive file.
 */
export class ArchiveFile {
  private sink: Sink | null;

  private constructor(
    readonly filePath: string,
    readonly gzip: boolean,
    readonly mode: ArchiveMode,
    sink: Sink | null
  ) {
    this.sink = sink;
  }

  /**
   * Open a file.
   *
   * Executable files are created with mode 0o755; an existing file is
   * chmod-ed as well. Permission changes are best effort.
   *
   * @throws {IOError} If the file cannot be opened
   */
  static async open(filePath: string, options: ArchiveFileOptions): Promise<ArchiveFile> {
    const createMode = options.executable ? EXECUTABLE_MODE : 0o644;
    let sink: Sink | null;

    try {
      if (options.mode === 'r') {
        // Read mode only checks that the file exists; contents are read on demand
        const handle = await fs.open(filePath, 'r');
        await handle.close();
        sink = null;
      } else if (options.gzip) {
        const out = createWriteStream(filePath, { flags: options.mode, mode: createMode });
        await once(out, 'open');
        const gzip = createGzip();
        const done = pipeline(gzip, out).then(
          () => null,
          (err: unknown) => toError(err)
        );
        sink = new GzipSink(gzip, done);
      } else {
        sink = new PlainSink(await fs.open(filePath, options.mode, createMode));
      }
    } catch (err) {
      throw new IOError(`open (${options.mode})`, filePath, toError(err));
    }

    if (options.executable && options.mode !== 'r') {
      try {
        await fs.chmod(filePath, EXECUTABLE_MODE);
      } catch (err) {
        console.warn(`Could not mark '${filePath}' executable: ${toError(err).message}`);
      }
    }

    return new ArchiveFile(filePath, options.gzip, options.mode, sink);
  }

  /** Whether the file can still be written */
  get isOpen(): boolean {
    return this.sink !== null;
  }

  /**
   * Append text to the file.
   *
   * @throws {IOError} If the file is closed or was opened read-only
   */
  async write(text: string): Promise<void> {
    if (!this.sink) {
      throw new IOError('write', this.filePath, new Error('archive is closed or read-only'));
    }
    try {
      await this.sink.write(text);
    } catch (err) {
      throw new IOError('write', this.filePath, toError(err));
    }
  }

  /**
   * Close the handle. Safe to call multiple times.
   *
   * @throws {IOError} If flushing the file fails
   */
  async close(): Promise<void> {
    const sink = this.sink;
    this.sink = null;
    if (!sink) return;
    try {
      await sink.close();
    } catch (err) {
      throw new IOError('close', this.filePath, toError(err));
    }
  }

  /** Read the whole file, decompressing gzip files */
  async readText(): Promise<string> {
    const data = await fs.readFile(this.filePath);
    return (this.gzip ? gunzipSync(data) : data).toString('utf-8');
  }

  /** Replace the whole file, compressing gzip files */
  async replaceText(text: string): Promise<void> {
    const data = Buffer.from(text, 'utf-8');
    await fs.writeFile(this.filePath, this.gzip ? gzipSync(data) : data);
  }
}
