/**
 * SVG helpers shared by the renderers
 */

import type { Thumbnail } from './types';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, char => XML_ESCAPES[char] ?? char);
}

export function svgThumbnail(width: number, height: number, body: string): Thumbnail {
  return {
    mediaType: 'image/svg+xml',
    width,
    height,
    data: `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">${body}</svg>`
  };
}
