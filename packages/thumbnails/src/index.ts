/**
 * Spindle Thumbnails
 * ThumbnailRenderer capability, built-in renderers and the Thumbnailer
 */

export * from './types';
export * from './capability';
export * from './config';
export * from './source-file';
export * from './svg';
export * from './builtin';
export * from './thumbnailer';
export * from './env';

export * from './renderers/text-renderer';
export * from './renderers/svg-renderer';
export * from './renderers/placeholder-renderer';
