/**
 * Built-in renderer registrations
 */

import type { ProviderRegistration, ServiceRegistry } from '@spindle/sdk';
import { ThumbnailRendererCapability, type ThumbnailRenderer } from './capability';
import { createPlaceholderRenderer } from './renderers/placeholder-renderer';
import { createSvgRenderer } from './renderers/svg-renderer';
import { createTextRenderer } from './renderers/text-renderer';

export const BUILTIN_RENDERERS: readonly ProviderRegistration<ThumbnailRenderer>[] = [
  {
    name: 'text',
    factory: createTextRenderer,
    description: 'Plain text, markdown, CSV and source files',
    version: '1.0.0'
  },
  {
    name: 'svg',
    factory: createSvgRenderer,
    description: 'SVG images',
    version: '1.0.0'
  }
];

export const FALLBACK_RENDERER: ProviderRegistration<ThumbnailRenderer> = {
  name: 'placeholder',
  factory: createPlaceholderRenderer,
  description: 'Any file',
  version: '1.0.0'
};

/**
 * Registers text and svg, then, unless `fallback` is false, the placeholder
 */
export function registerBuiltinRenderers(
  registry: ServiceRegistry,
  options: { fallback?: boolean; config?: Record<string, unknown> } = {}
): void {
  for (const registration of BUILTIN_RENDERERS) {
    registry.register(ThumbnailRendererCapability, { ...registration, config: options.config });
  }

  if (options.fallback ?? true) {
    registerFallbackRenderer(registry, options.config);
  }
}

export function registerFallbackRenderer(registry: ServiceRegistry, config?: Record<string, unknown>): void {
  registry.register(ThumbnailRendererCapability, { ...FALLBACK_RENDERER, config });
}
