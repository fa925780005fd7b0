/**
 * Lazy provider sequence returned by ServiceRegistry.load
 */

import { ProviderConfigurationError } from '../types/errors';

type EntryState<T> =
  | { status: 'pending' }
  | { status: 'realized'; provider: T }
  | { status: 'failed'; error: ProviderConfigurationError };

/**
 * Handle to one registered provider. Nothing is constructed until `get()`;
 * the outcome, provider or failure, is then kept for this entry.
 */
export class ProviderEntry<T> {
  private state: EntryState<T> = { status: 'pending' };

  constructor(
    readonly capability: string,
    readonly name: string,
    readonly index: number,
    private readonly realize: () => T
  ) {}

  get realized(): boolean {
    return this.state.status === 'realized';
  }

  /**
   * @throws ProviderConfigurationError when the provider cannot be built
   */
  get(): T {
    switch (this.state.status) {
      case 'realized':
        return this.state.provider;
      case 'failed':
        throw this.state.error;
      case 'pending':
        break;
    }

    try {
      const provider = this.realize();
      this.state = { status: 'realized', provider };
      return provider;
    } catch (error) {
      const failure =
        error instanceof ProviderConfigurationError
          ? error
          : new ProviderConfigurationError(
              `Provider ${this.name} for ${this.capability} could not be constructed`,
              this.name,
              { capability: this.capability, index: this.index },
              error
            );
      this.state = { status: 'failed', error: failure };
      throw failure;
    }
  }
}

export type EntryErrorHandler<T> = (error: ProviderConfigurationError, entry: ProviderEntry<T>) => void;

/**
 * One-shot iterator over provider entries in registration order
 */
export class ProviderIterator<T> implements IterableIterator<ProviderEntry<T>> {
  private position = 0;

  constructor(private readonly entries: readonly ProviderEntry<T>[]) {}

  next(): IteratorResult<ProviderEntry<T>> {
    const entry = this.entries[this.position];
    if (entry === undefined) {
      return { done: true, value: undefined };
    }

    this.position++;
    return { done: false, value: entry };
  }

  [Symbol.iterator](): ProviderIterator<T> {
    return this;
  }

  /**
   * Realized providers only; entries that fail are reported to `onError` and skipped
   */
  *providers(onError?: EntryErrorHandler<T>): Generator<T, void, undefined> {
    for (const entry of this) {
      let provider: T;
      try {
        provider = entry.get();
      } catch (error) {
        if (!(error instanceof ProviderConfigurationError)) {
          throw error;
        }
        onError?.(error, entry);
        continue;
      }
      yield provider;
    }
  }
}
