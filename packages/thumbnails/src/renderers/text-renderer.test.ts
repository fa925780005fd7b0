/**
 * Tests for TextRenderer
 */

import { describe, it, expect } from 'vitest';
import { ProviderProcessingError } from '@spindle/sdk';
import { TextRenderer, createTextRenderer } from './text-renderer';
import { TextRendererConfigSchema } from '../config';
import { sourceFile } from '../source-file';

const encode = (text: string) => new TextEncoder().encode(text);

describe('TextRenderer', () => {
  const renderer = new TextRenderer();

  it('accepts text media types and known source extensions', () => {
    expect(renderer.accepts(sourceFile('notes.md', encode('')))).toBe(true);
    expect(renderer.accepts(sourceFile('data.json', encode('')))).toBe(true);
    expect(renderer.accepts(sourceFile('photo.png', encode('')))).toBe(false);
  });

  it('renders the first lines as escaped SVG text', async () => {
    const thumbnail = await renderer.process(sourceFile('notes.txt', encode('alpha\nbeta & <gamma>')));

    expect(thumbnail).toEqual({
      mediaType: 'image/svg+xml',
      width: 128,
      height: 128,
      data:
        '<svg xmlns="http://www.w3.org/2000/svg" width="128" height="128" viewBox="0 0 128 128">' +
        '<rect width="128" height="128" fill="#ffffff" stroke="#d0d7de"/>' +
        '<text x="8" y="22" font-family="monospace" font-size="12" fill="#24292f">alpha</text>' +
        '<text x="8" y="36" font-family="monospace" font-size="12" fill="#24292f">beta &amp; &lt;gamma&gt;</text>' +
        '</svg>'
    });
  });

  it('stops after maxLines', async () => {
    const limited = new TextRenderer(TextRendererConfigSchema.parse({ maxLines: 2 }));

    const thumbnail = await limited.process(sourceFile('notes.txt', encode('a\nb\nc')));

    expect(thumbnail.data.match(/<text /g)).toHaveLength(2);
    expect(thumbnail.data).not.toContain('>c</text>');
  });

  it('truncates long lines', async () => {
    const narrow = new TextRenderer(TextRendererConfigSchema.parse({ maxColumns: 6 }));

    const thumbnail = await narrow.process(sourceFile('notes.txt', encode('abcdefghij')));

    expect(thumbnail.data).toContain('>abcde…</text>');
  });

  it('counts astral characters as single columns', async () => {
    const narrow = new TextRenderer(TextRendererConfigSchema.parse({ maxColumns: 4 }));

    const fits = await narrow.process(sourceFile('notes.txt', encode('🙂🙂🙂🙂')));
    const cut = await narrow.process(sourceFile('notes.txt', encode('🙂🙂🙂🙂🙂')));

    expect(fits.data).toContain('>🙂🙂🙂🙂</text>');
    expect(cut.data).toContain('>🙂🙂🙂…</text>');
  });

  it('rejects bytes that are not UTF-8', async () => {
    const file = sourceFile('blob.txt', new Uint8Array([0xff, 0xfe, 0xfd]));

    await expect(renderer.process(file)).rejects.toBeInstanceOf(ProviderProcessingError);
    await expect(renderer.process(file)).rejects.toThrow('blob.txt is not valid UTF-8 text');
  });

  it('builds from raw config through its factory', () => {
    expect(createTextRenderer({ maxLines: 3 }).description()).toBe('Text preview of the first 3 lines');
    expect(() => createTextRenderer({ maxLines: 0 })).toThrow();
  });
});
