/**
 * Dispatcher
 * First-match selection over a registry's providers
 */

import { context, SpanStatusCode, trace, type Span, type Tracer } from '@opentelemetry/api';
import type { Capability, Handler } from '../interfaces/provider';
import type { ProviderEntry } from '../registry/provider-iterator';
import type { ServiceRegistry } from '../registry/service-registry';
import { noopLogger, type Logger, type SpindleContext } from '../types/context';
import { ErrorFactory, ProviderConfigurationError } from '../types/errors';

export interface ProviderDescriptor {
  name: string;
  description: string;
}

export interface SelectedProvider<T> {
  name: string;
  index: number;
  provider: T;
}

export interface HandleResult<T, O> {
  provider: T;
  output: O;
}

export type DispatcherOptions = Partial<SpindleContext>;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'function') &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class Dispatcher {
  private logger: Logger;
  private tracer: Tracer;
  // Where each handed-out provider came from, for span attributes
  private origins = new WeakMap<object, { capability: string; name: string }>();

  constructor(
    private readonly registry: ServiceRegistry,
    options: DispatcherOptions = {}
  ) {
    this.logger = options.logger ?? noopLogger;
    this.tracer = options.tracer ?? trace.getTracer('@spindle/sdk');
  }

  /**
   * First provider, in registration order, that accepts the input.
   * Providers that fail to construct are logged and skipped; `undefined`
   * means nothing accepted it.
   */
  findProvider<T extends Handler<I, unknown>, I>(capability: Capability<T>, input: I): T | undefined {
    return this.selectProvider(capability, input)?.provider;
  }

  /**
   * Like findProvider, with the registered name and position of the match
   */
  selectProvider<T extends Handler<I, unknown>, I>(
    capability: Capability<T>,
    input: I
  ): SelectedProvider<T> | undefined {
    for (const entry of this.registry.load(capability)) {
      const provider = this.realize(entry);
      if (provider === undefined) {
        continue;
      }

      if (provider.accepts(input)) {
        this.logger.debug('Provider selected', {
          capability: capability.name,
          providerName: entry.name,
          index: entry.index
        });
        return { name: entry.name, index: entry.index, provider };
      }
    }

    this.logger.debug('No provider accepted input', { capability: capability.name });
    return undefined;
  }

  /**
   * Every accepting provider, in registration order
   */
  findAll<T extends Handler<I, unknown>, I>(capability: Capability<T>, input: I): T[] {
    const accepted: T[] = [];
    for (const entry of this.registry.load(capability)) {
      const provider = this.realize(entry);
      if (provider !== undefined && provider.accepts(input)) {
        accepted.push(provider);
      }
    }
    return accepted;
  }

  /**
   * Name and description of every provider that can be constructed
   */
  describe<T extends Handler<never, unknown>>(capability: Capability<T>): ProviderDescriptor[] {
    const descriptors: ProviderDescriptor[] = [];
    for (const entry of this.registry.load(capability)) {
      const provider = this.realize(entry);
      if (provider !== undefined) {
        descriptors.push({ name: entry.name, description: provider.description() });
      }
    }
    return descriptors;
  }

  /**
   * Run the provider. Whatever it throws or rejects with reaches the caller
   * as is.
   */
  dispatch<I, O>(provider: Handler<I, O>, input: I): O {
    const span = this.tracer.startSpan('spindle.dispatch');
    const origin = this.origins.get(provider);
    if (origin !== undefined) {
      span.setAttribute('spindle.capability', origin.capability);
      span.setAttribute('spindle.provider', origin.name);
    }

    let output: O;
    try {
      output = context.with(trace.setSpan(context.active(), span), () => provider.process(input));
    } catch (error) {
      this.endWithError(span, error);
      throw error;
    }

    if (isPromiseLike(output)) {
      void output.then(
        () => span.end(),
        (error: unknown) => this.endWithError(span, error)
      );
    } else {
      span.end();
    }

    return output;
  }

  /**
   * findProvider followed by dispatch
   */
  handle<I, O>(capability: Capability<Handler<I, O>>, input: I): HandleResult<Handler<I, O>, O> | undefined {
    const provider = this.findProvider(capability, input);
    if (provider === undefined) {
      return undefined;
    }
    return { provider, output: this.dispatch(provider, input) };
  }

  /**
   * The entry's provider, or undefined after logging a construction failure
   */
  private realize<T extends object>(entry: ProviderEntry<T>): T | undefined {
    try {
      const provider = entry.get();
      this.origins.set(provider, { capability: entry.capability, name: entry.name });
      return provider;
    } catch (error) {
      if (!(error instanceof ProviderConfigurationError)) {
        throw error;
      }

      this.logger.warn('Skipping provider that failed to construct', {
        capability: entry.capability,
        providerName: entry.name,
        index: entry.index,
        error: error.toJSON()
      });
      return undefined;
    }
  }

  private endWithError(span: Span, error: unknown): void {
    span.recordException(error instanceof Error ? error : String(error));
    span.setStatus({ code: SpanStatusCode.ERROR, message: ErrorFactory.describe(error) });
    span.end();
  }
}
