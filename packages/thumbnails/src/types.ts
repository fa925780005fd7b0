/**
 * Thumbnail domain types
 */

/**
 * A file offered to the renderers. `extension` is lower-cased and keeps its
 * dot (".txt"), or is empty.
 */
export interface SourceFile {
  path: string;
  name: string;
  extension: string;
  mediaType: string;
  bytes: Uint8Array;
}

export interface Thumbnail {
  mediaType: 'image/svg+xml';
  width: number;
  height: number;
  data: string;
}
