/**
 * Placeholder Renderer
 * Generic file icon labelled with the extension; accepts anything, so it
 * belongs last in the registry
 */

import { configuredFactory } from '@spindle/sdk';
import type { ThumbnailRenderer } from '../capability';
import { PlaceholderRendererConfigSchema, type PlaceholderRendererConfig } from '../config';
import { escapeXml, svgThumbnail } from '../svg';
import type { SourceFile, Thumbnail } from '../types';

const MAX_LABEL = 5;

export class PlaceholderRenderer implements ThumbnailRenderer {
  constructor(private readonly config: PlaceholderRendererConfig = PlaceholderRendererConfigSchema.parse({})) {}

  description(): string {
    return 'File icon for anything else';
  }

  accepts(): boolean {
    return true;
  }

  async process(file: SourceFile): Promise<Thumbnail> {
    const { size } = this.config;
    const label = file.extension ? file.extension.slice(1, MAX_LABEL + 1).toUpperCase() : 'FILE';
    const scale = (fraction: number) => Math.round(size * fraction);

    const icon =
      `<rect x="${scale(1 / 8)}" y="${scale(1 / 16)}" width="${scale(3 / 4)}" height="${scale(7 / 8)}" rx="${scale(1 / 16)}" fill="#f6f8fa" stroke="#8c959f"/>` +
      `<text x="${scale(1 / 2)}" y="${scale(9 / 16)}" text-anchor="middle" font-family="sans-serif" font-size="${scale(5 / 32)}" fill="#57606a">${escapeXml(label)}</text>`;

    return svgThumbnail(size, size, icon);
  }
}

export const createPlaceholderRenderer = configuredFactory(
  PlaceholderRendererConfigSchema,
  config => new PlaceholderRenderer(config)
);
