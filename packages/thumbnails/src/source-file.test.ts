/**
 * Tests for source file loading
 */

import { describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_MEDIA_TYPE, mediaTypeFor, readSourceFile, sourceFile } from './source-file';

describe('source files', () => {
  it('maps extensions to media types', () => {
    expect(mediaTypeFor('.MD')).toBe('text/markdown');
    expect(mediaTypeFor('.svg')).toBe('image/svg+xml');
    expect(mediaTypeFor('.unknown')).toBe(DEFAULT_MEDIA_TYPE);
    expect(mediaTypeFor('')).toBe(DEFAULT_MEDIA_TYPE);
  });

  it('describes a file from its path', () => {
    const file = sourceFile('/docs/Report.TXT', new Uint8Array([104, 105]));

    expect(file).toEqual({
      path: '/docs/Report.TXT',
      name: 'Report.TXT',
      extension: '.txt',
      mediaType: 'text/plain',
      bytes: new Uint8Array([104, 105])
    });
  });

  it('reads a file from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'spindle-source-'));
    try {
      const path = join(dir, 'notes.csv');
      await writeFile(path, 'a,b\n1,2\n', 'utf8');

      const file = await readSourceFile(path);

      expect(file.mediaType).toBe('text/csv');
      expect(new TextDecoder().decode(file.bytes)).toBe('a,b\n1,2\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
