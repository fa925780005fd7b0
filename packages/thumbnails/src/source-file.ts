/**
 * Source file loading
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import mediaTypes from './media-types.json';
import type { SourceFile } from './types';

const MEDIA_TYPES = new Map<string, string>(Object.entries(mediaTypes));

export const DEFAULT_MEDIA_TYPE = 'application/octet-stream';

export function mediaTypeFor(extension: string): string {
  return MEDIA_TYPES.get(extension.toLowerCase()) ?? DEFAULT_MEDIA_TYPE;
}

export function sourceFile(path: string, bytes: Uint8Array): SourceFile {
  const extension = extname(path).toLowerCase();
  return {
    path,
    name: basename(path),
    extension,
    mediaType: mediaTypeFor(extension),
    bytes
  };
}

export async function readSourceFile(path: string): Promise<SourceFile> {
  const bytes = await readFile(path);
  return sourceFile(path, new Uint8Array(bytes));
}
