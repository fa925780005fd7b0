/**
 * ThumbnailRenderer capability
 */

import { defineCapability, type Handler } from '@spindle/sdk';
import type { SourceFile, Thumbnail } from './types';

/**
 * Renders a preview for the files it accepts
 */
export interface ThumbnailRenderer extends Handler<SourceFile, Promise<Thumbnail>> {
  /** One line shown by `spindle-thumbnail list` */
  description(): string;
  accepts(file: SourceFile): boolean;
  /** Rejects with ProviderProcessingError when the file cannot be rendered */
  process(file: SourceFile): Promise<Thumbnail>;
}

export function isThumbnailRenderer(value: unknown): value is ThumbnailRenderer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'description' in value &&
    typeof value.description === 'function' &&
    'accepts' in value &&
    typeof value.accepts === 'function' &&
    'process' in value &&
    typeof value.process === 'function'
  );
}

export const ThumbnailRendererCapability = defineCapability<ThumbnailRenderer>('thumbnail-renderer', {
  description: 'Renders SVG thumbnails for source files',
  isProvider: isThumbnailRenderer
});
