/**
 * SVG Renderer
 * Scales an SVG document into the thumbnail box
 */

import { configuredFactory, ProviderProcessingError } from '@spindle/sdk';
import type { ThumbnailRenderer } from '../capability';
import { SvgRendererConfigSchema, type SvgRendererConfig } from '../config';
import { svgThumbnail } from '../svg';
import type { SourceFile, Thumbnail } from '../types';

export class SvgRenderer implements ThumbnailRenderer {
  constructor(private readonly config: SvgRendererConfig = SvgRendererConfigSchema.parse({})) {}

  description(): string {
    return 'Scaled copy of SVG images';
  }

  accepts(file: SourceFile): boolean {
    return file.mediaType === 'image/svg+xml';
  }

  async process(file: SourceFile): Promise<Thumbnail> {
    const text = new TextDecoder().decode(file.bytes);
    if (!/<svg[\s>]/i.test(text)) {
      throw new ProviderProcessingError('not an svg document', 'svg', { path: file.path });
    }

    const { size } = this.config;
    const href = `data:image/svg+xml;base64,${Buffer.from(file.bytes).toString('base64')}`;
    return svgThumbnail(
      size,
      size,
      `<image href="${href}" width="${size}" height="${size}" preserveAspectRatio="xMidYMid meet"/>`
    );
  }
}

export const createSvgRenderer = configuredFactory(SvgRendererConfigSchema, config => new SvgRenderer(config));
