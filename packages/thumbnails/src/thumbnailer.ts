/**
 * Thumbnailer
 * Wires the renderer registry to a dispatcher
 */

import type { Tracer } from '@opentelemetry/api';
import {
  Dispatcher,
  loadManifest,
  noopLogger,
  ServiceRegistry,
  type Logger,
  type ModuleImporter,
  type ProviderDescriptor,
  type SelectedProvider
} from '@spindle/sdk';
import { FALLBACK_RENDERER, registerBuiltinRenderers, registerFallbackRenderer } from './builtin';
import { ThumbnailRendererCapability, type ThumbnailRenderer } from './capability';
import type { SourceFile, Thumbnail } from './types';

export interface ThumbnailerOptions {
  logger?: Logger;
  tracer?: Tracer;
  /** Renderers listed here are tried after text and svg, before the placeholder */
  manifestPath?: string;
  importModule?: ModuleImporter;
  /** Size passed to every built-in renderer */
  size?: number;
}

export class Thumbnailer {
  constructor(
    readonly registry: ServiceRegistry,
    private readonly dispatcher: Dispatcher,
    private readonly logger: Logger = noopLogger
  ) {}

  static async create(options: ThumbnailerOptions = {}): Promise<Thumbnailer> {
    const logger = options.logger ?? noopLogger;
    const registry = new ServiceRegistry({ logger });
    const config = options.size === undefined ? undefined : { size: options.size };

    registerBuiltinRenderers(registry, { fallback: false, config });

    if (options.manifestPath) {
      await loadManifest(registry, options.manifestPath, {
        capabilities: [ThumbnailRendererCapability],
        logger,
        importModule: options.importModule,
        reserved: { [ThumbnailRendererCapability.name]: [FALLBACK_RENDERER.name] }
      });
    }

    registerFallbackRenderer(registry, config);

    return new Thumbnailer(registry, new Dispatcher(registry, { logger, tracer: options.tracer }), logger);
  }

  renderers(): ProviderDescriptor[] {
    return this.dispatcher.describe(ThumbnailRendererCapability);
  }

  rendererFor(file: SourceFile): ThumbnailRenderer | undefined {
    return this.dispatcher.findProvider(ThumbnailRendererCapability, file);
  }

  /**
   * Registered name and instance of the renderer that would handle the file
   */
  selectRenderer(file: SourceFile): SelectedProvider<ThumbnailRenderer> | undefined {
    return this.dispatcher.selectProvider(ThumbnailRendererCapability, file);
  }

  candidatesFor(file: SourceFile): ThumbnailRenderer[] {
    return this.dispatcher.findAll(ThumbnailRendererCapability, file);
  }

  /**
   * `undefined` when no renderer accepts the file
   */
  async render(file: SourceFile): Promise<Thumbnail | undefined> {
    const renderer = this.rendererFor(file);
    if (!renderer) {
      this.logger.info('Unsupported file', { path: file.path, mediaType: file.mediaType });
      return undefined;
    }
    return this.dispatcher.dispatch(renderer, file);
  }
}
