/**
 * Core Provider Interfaces
 * Capabilities, handlers and the registrations that produce them
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Token naming a capability interface. `T` is the contract its providers
 * implement. Registrations are keyed by `name`, so two tokens with the same
 * name address the same providers.
 */
export interface Capability<T> {
  readonly name: string;
  readonly description?: string;

  /**
   * Checks a constructed provider really implements `T`
   */
  readonly isProvider: (value: unknown) => value is T;
}

export interface CapabilityOptions<T> {
  description?: string;
  isProvider?: (value: unknown) => value is T;
}

export function defineCapability<T>(name: string, options: CapabilityOptions<T> = {}): Capability<T> {
  if (!name.trim()) {
    throw new TypeError('Capability name must not be empty');
  }

  // Without a guard, anything but an object or function is rejected
  const isProvider =
    options.isProvider ??
    ((value: unknown): value is T =>
      value !== null && (typeof value === 'object' || typeof value === 'function'));

  return Object.freeze({
    name,
    description: options.description,
    isProvider
  });
}

/**
 * Shape the dispatcher needs from a provider: a predicate and a processing
 * method over the same input
 */
export interface Handler<I, O> {
  description(): string;
  accepts(input: I): boolean;
  process(input: I): O;
}

/**
 * Provider factory function type
 */
export type ProviderFactory<T> = (config: Record<string, unknown>) => T;

/**
 * Factory that validates its raw config through a zod schema before building
 */
export function configuredFactory<C, T>(
  schema: ZodType<C, ZodTypeDef, unknown>,
  build: (config: C) => T
): ProviderFactory<T> {
  return (config) => build(schema.parse(config));
}

/**
 * `singleton` providers are built once and reused by every later `load`;
 * `transient` ones are rebuilt on each traversal
 */
export type ProviderLifetime = 'singleton' | 'transient';

/**
 * Provider registration information
 */
export interface ProviderRegistration<T> {
  name: string;
  factory: ProviderFactory<T>;
  config?: Record<string, unknown>;
  lifetime?: ProviderLifetime;
  description?: string;
  version?: string;
}

/**
 * Registration as reported by the registry: no factory, no raw config
 */
export interface RegistrationInfo {
  capability: string;
  name: string;
  index: number;
  lifetime: ProviderLifetime;
  description?: string;
  version?: string;
}
