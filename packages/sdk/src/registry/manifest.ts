/**
 * Manifest loader
 * Registers providers listed in a JSON manifest file
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { Capability, ProviderFactory } from '../interfaces/provider';
import { noopLogger, type Logger } from '../types/context';
import { ErrorCode, ErrorFactory } from '../types/errors';
import type { ServiceRegistry } from './service-registry';

export const ManifestEntrySchema = z.object({
  name: z.string().min(1),
  module: z.string().min(1),
  export: z.string().min(1).default('default'),
  config: z.record(z.unknown()).default({}),
  enabled: z.boolean().default(true),
  lifetime: z.enum(['singleton', 'transient']).default('singleton'),
  description: z.string().optional(),
  version: z.string().optional()
});

export const ManifestSchema = z.object({
  version: z.literal(1),
  // Keyed by capability name, entries in discovery order
  providers: z.record(z.array(ManifestEntrySchema)).default({})
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface ManifestOptions {
  /** Capabilities this process knows; entries for others are ignored */
  capabilities: readonly Capability<unknown>[];
  logger?: Logger;
  importModule?: ModuleImporter;
  /** Names per capability the caller registers after the manifest */
  reserved?: Readonly<Record<string, readonly string[]>>;
}

export type IgnoreReason = 'disabled' | 'unknown-capability' | 'duplicate';

export interface ManifestLoadReport {
  registered: Array<{ capability: string; name: string }>;
  ignored: Array<{ capability: string; name: string; reason: IgnoreReason }>;
  unresolved: Array<{ capability: string; name: string; error: string }>;
}

const defaultImporter: ModuleImporter = specifier => import(specifier);

function isFactory(value: unknown): value is ProviderFactory<unknown> {
  return typeof value === 'function';
}

function readExport(moduleNamespace: unknown, exportName: string): unknown {
  if (typeof moduleNamespace !== 'object' || moduleNamespace === null) {
    return undefined;
  }
  return Object.entries(moduleNamespace).find(([key]) => key === exportName)?.[1];
}

/**
 * Relative module paths are taken from the manifest's directory; anything
 * else is left to the module resolver
 */
export function resolveModuleSpecifier(manifestPath: string, specifier: string): string {
  if (specifier.startsWith('.')) {
    return pathToFileURL(resolve(dirname(manifestPath), specifier)).href;
  }
  if (isAbsolute(specifier)) {
    return pathToFileURL(specifier).href;
  }
  return specifier;
}

export async function readManifest(path: string): Promise<Manifest> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw ErrorFactory.create(
      ErrorCode.InvalidManifest,
      `Cannot read manifest ${path}: ${ErrorFactory.describe(error)}`,
      'manifest',
      { path },
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw ErrorFactory.create(
      ErrorCode.InvalidManifest,
      `Manifest ${path} is not valid JSON`,
      'manifest',
      { path },
      error
    );
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw ErrorFactory.create(
      ErrorCode.InvalidManifest,
      `Manifest ${path} is invalid`,
      'manifest',
      { path, issues: parsed.error.issues },
      parsed.error
    );
  }

  return parsed.data;
}

/**
 * Register every enabled manifest entry, in file order. Modules are imported
 * here; an entry whose module or export cannot be resolved is still
 * registered and fails when the registry tries to construct it.
 */
export async function loadManifest(
  registry: ServiceRegistry,
  path: string,
  options: ManifestOptions
): Promise<ManifestLoadReport> {
  const logger = options.logger ?? noopLogger;
  const importModule = options.importModule ?? defaultImporter;
  const known = new Map(options.capabilities.map(capability => [capability.name, capability]));
  const manifest = await readManifest(path);

  const report: ManifestLoadReport = { registered: [], ignored: [], unresolved: [] };

  for (const [capabilityName, entries] of Object.entries(manifest.providers)) {
    const capability = known.get(capabilityName);

    for (const entry of entries) {
      if (!capability) {
        logger.warn('Manifest entry for unknown capability ignored', {
          capability: capabilityName,
          providerName: entry.name,
          manifest: path
        });
        report.ignored.push({ capability: capabilityName, name: entry.name, reason: 'unknown-capability' });
        continue;
      }

      if (!entry.enabled) {
        report.ignored.push({ capability: capabilityName, name: entry.name, reason: 'disabled' });
        continue;
      }

      const taken =
        registry.registrations(capability).some(info => info.name === entry.name) ||
        (options.reserved?.[capabilityName] ?? []).includes(entry.name);
      if (taken) {
        logger.warn('Manifest entry with a name already in use ignored', {
          capability: capabilityName,
          providerName: entry.name,
          manifest: path
        });
        report.ignored.push({ capability: capabilityName, name: entry.name, reason: 'duplicate' });
        continue;
      }

      const factory = await resolveFactory(path, entry, importModule);
      if (!isFactory(factory)) {
        logger.warn('Manifest provider could not be resolved', {
          capability: capabilityName,
          providerName: entry.name,
          module: entry.module,
          error: factory.message
        });
        report.unresolved.push({ capability: capabilityName, name: entry.name, error: factory.message });
      }

      registry.register(capability, {
        name: entry.name,
        factory: isFactory(factory)
          ? factory
          : () => {
              throw factory;
            },
        config: entry.config,
        lifetime: entry.lifetime,
        description: entry.description,
        version: entry.version
      });
      report.registered.push({ capability: capabilityName, name: entry.name });
    }
  }

  logger.info('Manifest loaded', {
    manifest: path,
    registered: report.registered.length,
    ignored: report.ignored.length,
    unresolved: report.unresolved.length
  });

  return report;
}

async function resolveFactory(
  manifestPath: string,
  entry: ManifestEntry,
  importModule: ModuleImporter
): Promise<ProviderFactory<unknown> | Error> {
  const specifier = resolveModuleSpecifier(manifestPath, entry.module);

  let moduleNamespace: unknown;
  try {
    moduleNamespace = await importModule(specifier);
  } catch (error) {
    return ErrorFactory.create(
      ErrorCode.ProviderConfiguration,
      `Cannot import ${entry.module}: ${ErrorFactory.describe(error)}`,
      entry.name,
      { module: entry.module },
      error
    );
  }

  const candidate = readExport(moduleNamespace, entry.export);
  if (!isFactory(candidate)) {
    return ErrorFactory.create(
      ErrorCode.ProviderConfiguration,
      `Export ${entry.export} of ${entry.module} is not a provider factory`,
      entry.name,
      { module: entry.module, export: entry.export }
    );
  }

  return candidate;
}
