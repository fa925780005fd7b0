/**
 * Text Renderer
 * Draws the first lines of a text file
 */

import { configuredFactory, ProviderProcessingError } from '@spindle/sdk';
import type { ThumbnailRenderer } from '../capability';
import { TextRendererConfigSchema, type TextRendererConfig } from '../config';
import { escapeXml, svgThumbnail } from '../svg';
import type { SourceFile, Thumbnail } from '../types';

const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.csv', '.log', '.json', '.ts', '.js']);

const PADDING = 8;

export class TextRenderer implements ThumbnailRenderer {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly config: TextRendererConfig = TextRendererConfigSchema.parse({})) {}

  description(): string {
    return `Text preview of the first ${this.config.maxLines} lines`;
  }

  accepts(file: SourceFile): boolean {
    return file.mediaType.startsWith('text/') || TEXT_EXTENSIONS.has(file.extension);
  }

  async process(file: SourceFile): Promise<Thumbnail> {
    let text: string;
    try {
      text = this.decoder.decode(file.bytes);
    } catch (error) {
      throw new ProviderProcessingError(`${file.name} is not valid UTF-8 text`, 'text', { path: file.path }, error);
    }

    const { size, maxLines } = this.config;
    const lineHeight = Math.round((size - 2 * PADDING) / maxLines);
    const fontSize = Math.max(lineHeight - 2, 1);

    const lines = text
      .split(/\r?\n/)
      .slice(0, maxLines)
      .map((line, index) => ({ text: this.fit(line), y: PADDING + lineHeight * (index + 1) }))
      .filter(line => line.text.trim().length > 0)
      .map(
        line =>
          `<text x="${PADDING}" y="${line.y}" font-family="monospace" font-size="${fontSize}" fill="#24292f">${escapeXml(line.text)}</text>`
      );

    const background = `<rect width="${size}" height="${size}" fill="#ffffff" stroke="#d0d7de"/>`;
    return svgThumbnail(size, size, background + lines.join(''));
  }

  private fit(line: string): string {
    // Columns are code points so surrogate pairs stay whole
    const characters = Array.from(line.replace(/\t/g, '  '));
    const { maxColumns } = this.config;
    return characters.length > maxColumns
      ? `${characters.slice(0, maxColumns - 1).join('')}…`
      : characters.join('');
  }
}

export const createTextRenderer = configuredFactory(TextRendererConfigSchema, config => new TextRenderer(config));
