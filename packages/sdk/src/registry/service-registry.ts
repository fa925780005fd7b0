/**
 * Service Registry
 * Holds provider registrations per capability and hands out lazy,
 * failure-isolated provider sequences
 */

import type {
  Capability,
  ProviderLifetime,
  ProviderRegistration,
  RegistrationInfo
} from '../interfaces/provider';
import { noopLogger, type Logger } from '../types/context';
import { ErrorCode, ErrorFactory, ProviderConfigurationError } from '../types/errors';
import { ProviderEntry, ProviderIterator } from './provider-iterator';

/**
 * Capability token or its bare name
 */
export type CapabilityRef = string | { readonly name: string };

interface Slot {
  registration: ProviderRegistration<unknown>;
  lifetime: ProviderLifetime;
  instance?: { value: unknown };
}

export interface RegistryOptions {
  logger?: Logger;
}

function capabilityName(ref: CapabilityRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

export class ServiceRegistry {
  private slots = new Map<string, Slot[]>();
  private logger: Logger;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Append a provider for a capability. Order of registration is the order
   * of discovery.
   */
  register<T>(capability: Capability<T>, registration: ProviderRegistration<T>): void {
    const slots = this.slots.get(capability.name) ?? [];

    if (slots.some(slot => slot.registration.name === registration.name)) {
      throw ErrorFactory.create(
        ErrorCode.AlreadyExists,
        `Provider ${registration.name} is already registered for ${capability.name}`,
        registration.name,
        { capability: capability.name }
      );
    }

    slots.push({
      registration,
      lifetime: registration.lifetime ?? 'singleton'
    });
    this.slots.set(capability.name, slots);

    this.logger.debug('Provider registered', {
      capability: capability.name,
      providerName: registration.name,
      version: registration.version,
      config: registration.config
    });
  }

  unregister(capability: CapabilityRef, name: string): void {
    const key = capabilityName(capability);
    const slots = this.slots.get(key) ?? [];
    const remaining = slots.filter(slot => slot.registration.name !== name);

    if (remaining.length === slots.length) {
      throw ErrorFactory.create(
        ErrorCode.NotFound,
        `Provider ${name} is not registered for ${key}`,
        name,
        { capability: key }
      );
    }

    if (remaining.length === 0) {
      this.slots.delete(key);
    } else {
      this.slots.set(key, remaining);
    }

    this.logger.debug('Provider unregistered', { capability: key, providerName: name });
  }

  registrations(capability: CapabilityRef): RegistrationInfo[] {
    const key = capabilityName(capability);
    return (this.slots.get(key) ?? []).map((slot, index) => ({
      capability: key,
      name: slot.registration.name,
      index,
      lifetime: slot.lifetime,
      description: slot.registration.description,
      version: slot.registration.version
    }));
  }

  /**
   * Names of capabilities that have at least one registration
   */
  capabilities(): string[] {
    return Array.from(this.slots.keys());
  }

  /**
   * Fresh lazy sequence over the capability's providers. Registrations are
   * snapshotted now; providers are only built while the sequence is walked.
   */
  load<T>(capability: Capability<T>): ProviderIterator<T> {
    const slots = [...(this.slots.get(capability.name) ?? [])];

    const entries = slots.map(
      (slot, index) =>
        new ProviderEntry<T>(capability.name, slot.registration.name, index, () =>
          this.realize(capability, slot, index)
        )
    );

    return new ProviderIterator(entries);
  }

  private realize<T>(capability: Capability<T>, slot: Slot, index: number): T {
    const { registration } = slot;
    const context = { capability: capability.name, index };

    if (slot.instance && capability.isProvider(slot.instance.value)) {
      return slot.instance.value;
    }

    let value: unknown;
    try {
      value = registration.factory({ ...registration.config });
    } catch (error) {
      throw new ProviderConfigurationError(
        `Provider ${registration.name} for ${capability.name} could not be constructed: ${ErrorFactory.describe(error)}`,
        registration.name,
        context,
        error
      );
    }

    if (!capability.isProvider(value)) {
      throw new ProviderConfigurationError(
        `Provider ${registration.name} does not implement ${capability.name}`,
        registration.name,
        context
      );
    }

    if (slot.lifetime === 'singleton') {
      slot.instance = { value };
    }

    this.logger.debug('Provider constructed', {
      ...context,
      providerName: registration.name,
      lifetime: slot.lifetime
    });

    return value;
  }
}
