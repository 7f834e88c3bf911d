/**
 * Large-object loading
 *
 * Records may carry blob/clob values that still point at content stored
 * in the table's LOB directory. The loader reads those into the record
 * before conversion, up to a size limit; bigger objects stay external and
 * are converted from their reference text.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import type { ExternalLobReference, SourceRecord, SourceValue } from '@rowcast/core';
import { ImportIoError, formatLobReference } from '@rowcast/core';
import { DEFAULT_INLINE_LOB_LIMIT } from './config.js';

export const LOB_DIRECTORY = '_lob';

export interface ILargeObjectLoader {
  /** Returns a copy of the record with loadable large objects inlined */
  load(record: SourceRecord): Promise<SourceRecord>;
  close(): Promise<void>;
}

export interface LargeObjectLoaderOptions {
  /** Table location; external objects are read from its `_lob` directory */
  tableLocation: string;
  /** Largest object, in bytes or characters, read inline */
  inlineLobLimit?: number;
}

export class LargeObjectLoader implements ILargeObjectLoader {
  private readonly lobDir: string;
  private readonly inlineLobLimit: number;
  private readonly handles = new Map<string, FileHandle>();
  private closed = false;

  constructor(options: LargeObjectLoaderOptions) {
    this.lobDir = resolve(join(options.tableLocation, LOB_DIRECTORY));
    this.inlineLobLimit = options.inlineLobLimit ?? DEFAULT_INLINE_LOB_LIMIT;
  }

  async load(record: SourceRecord): Promise<SourceRecord> {
    if (this.closed) {
      throw new ImportIoError('Large object loader is closed');
    }

    const entries = await Promise.all(
      Object.entries(record).map(async ([field, value]) => [field, await this.loadValue(value)] as const)
    );
    return Object.fromEntries(entries);
  }

  async loadValue(value: SourceValue | null): Promise<SourceValue | null> {
    if (value?.kind === 'blob' && value.value.external && this.isInlinable(value.value.reference)) {
      const data = await this.readBytes(value.value.reference);
      return { kind: 'blob', value: { external: false, data } };
    }

    if (value?.kind === 'clob' && value.value.external && this.isInlinable(value.value.reference)) {
      const data = await this.readChars(value.value.reference);
      return { kind: 'clob', value: { external: false, data } };
    }

    return value;
  }

  async close(): Promise<void> {
    this.closed = true;
    const handles = Array.from(this.handles.values());
    this.handles.clear();
    const results = await Promise.allSettled(handles.map((handle) => handle.close()));
    const failure = results.find((result) => result.status === 'rejected');
    if (failure && failure.status === 'rejected') {
      throw new ImportIoError('Failed to close large object files', toError(failure.reason));
    }
  }

  private isInlinable(reference: ExternalLobReference): boolean {
    return reference.length <= this.inlineLobLimit;
  }

  private resolvePath(reference: ExternalLobReference): string {
    const path = resolve(this.lobDir, reference.file);
    const rel = relative(this.lobDir, path);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new ImportIoError(
        `Large object file is outside the LOB directory: ${reference.file}`,
        undefined,
        { reference: formatLobReference(reference) }
      );
    }
    return path;
  }

  private async handleFor(path: string): Promise<FileHandle> {
    const cached = this.handles.get(path);
    if (cached) return cached;

    const handle = await open(path, 'r');
    // A concurrent read of the same file may have opened it meanwhile
    const existing = this.handles.get(path);
    if (existing) {
      await handle.close();
      return existing;
    }
    this.handles.set(path, handle);
    return handle;
  }

  private async readBytes(reference: ExternalLobReference): Promise<Uint8Array> {
    const handle = await this.handleFor(this.resolvePath(reference));
    const buffer = Buffer.alloc(reference.length);
    const { bytesRead } = await handle.read(buffer, 0, reference.length, reference.offset);
    if (bytesRead !== reference.length) {
      throw truncated(reference, bytesRead);
    }
    return new Uint8Array(buffer.buffer, buffer.byteOffset, bytesRead);
  }

  /**
   * Clob offsets count characters, not bytes, so the file is decoded from
   * the start and read only up to the end of the referenced range.
   */
  private async readChars(reference: ExternalLobReference): Promise<string> {
    const handle = await this.handleFor(this.resolvePath(reference));
    const stream = handle.createReadStream({ encoding: 'utf-8', start: 0, autoClose: false });
    const end = reference.offset + reference.length;

    let position = 0;
    let data = '';
    for await (const chunk of stream) {
      const text = String(chunk);
      const from = Math.max(reference.offset - position, 0);
      const to = Math.min(end - position, text.length);
      if (to > from) {
        data += text.slice(from, to);
      }
      position += text.length;
      if (position >= end) break;
    }

    if (data.length !== reference.length) {
      throw truncated(reference, data.length);
    }
    return data;
  }
}

function truncated(reference: ExternalLobReference, actual: number): ImportIoError {
  return new ImportIoError(
    `Large object is shorter than its reference: expected ${reference.length}, read ${actual}`,
    undefined,
    { reference: formatLobReference(reference) }
  );
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
