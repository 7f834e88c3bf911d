import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { SourceValue } from '@rowcast/core';
import { ImportIoError } from '@rowcast/core';
import { LargeObjectLoader } from '../src/lob-loader.js';

let tmpDir = '';

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'import-mapper-lob-'));
  mkdirSync(join(tmpDir, '_lob'));
  writeFileSync(join(tmpDir, '_lob', 'lob_1.bin'), 'hello world!');
  writeFileSync(join(tmpDir, '_lob', 'clob_1.txt'), 'prefix-Some text', 'utf-8');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = '';
});

const blobRef = (file: string, offset: number, length: number): SourceValue => ({
  kind: 'blob',
  value: { external: true, reference: { file, offset, length } },
});

describe('LargeObjectLoader', () => {
  it('reads external blobs and clobs into the record', async () => {
    const loader = new LargeObjectLoader({ tableLocation: tmpDir });

    const record = await loader.load({
      doc: blobRef('lob_1.bin', 6, 5),
      notes: {
        kind: 'clob',
        value: { external: true, reference: { file: 'clob_1.txt', offset: 7, length: 9 } },
      },
      id: { kind: 'number', value: 1 },
      empty: null,
    });

    expect(record).toEqual({
      doc: { kind: 'blob', value: { external: false, data: new Uint8Array(Buffer.from('world')) } },
      notes: { kind: 'clob', value: { external: false, data: 'Some text' } },
      id: { kind: 'number', value: 1 },
      empty: null,
    });
    await loader.close();
  });

  it('leaves objects above the inline limit external', async () => {
    const loader = new LargeObjectLoader({ tableLocation: tmpDir, inlineLobLimit: 4 });
    const value = blobRef('lob_1.bin', 6, 5);

    expect(await loader.loadValue(value)).toBe(value);
    await loader.close();
  });

  it('reads a clob from a shared file larger than the inline limit', async () => {
    writeFileSync(
      join(tmpDir, '_lob', 'clob_shared.txt'),
      `${'é'.repeat(40_000)}Grüße${'x'.repeat(200_000)}`,
      'utf-8'
    );
    const loader = new LargeObjectLoader({ tableLocation: tmpDir, inlineLobLimit: 16 });

    const loaded = await loader.loadValue({
      kind: 'clob',
      value: { external: true, reference: { file: 'clob_shared.txt', offset: 40_000, length: 5 } },
    });

    expect(loaded).toEqual({ kind: 'clob', value: { external: false, data: 'Grüße' } });
    await loader.close();
  });

  it('fails when a clob file ends before the referenced characters', async () => {
    const loader = new LargeObjectLoader({ tableLocation: tmpDir });

    await expect(
      loader.loadValue({
        kind: 'clob',
        value: { external: true, reference: { file: 'clob_1.txt', offset: 12, length: 10 } },
      })
    ).rejects.toThrow('Large object is shorter than its reference: expected 10, read 4');
    await loader.close();
  });

  it('refuses files outside the LOB directory', async () => {
    const loader = new LargeObjectLoader({ tableLocation: tmpDir });

    await expect(loader.loadValue(blobRef('../secret.bin', 0, 1))).rejects.toThrow(
      'Large object file is outside the LOB directory: ../secret.bin'
    );
    await loader.close();
  });

  it('fails when the file is shorter than the reference', async () => {
    const loader = new LargeObjectLoader({ tableLocation: tmpDir });

    await expect(loader.loadValue(blobRef('lob_1.bin', 10, 5))).rejects.toThrow(
      new ImportIoError('Large object is shorter than its reference: expected 5, read 2')
    );
    await loader.close();
  });

  it('cannot be used after close', async () => {
    const loader = new LargeObjectLoader({ tableLocation: tmpDir });
    await loader.loadValue(blobRef('lob_1.bin', 0, 5));
    await loader.close();

    await expect(loader.load({})).rejects.toThrow('Large object loader is closed');
  });
});
