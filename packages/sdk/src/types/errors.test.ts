/**
 * Tests for the error model
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  ErrorFactory,
  InternalError,
  InvalidManifestError,
  ProviderConfigurationError,
  ProviderProcessingError
} from './errors';

describe('ErrorFactory', () => {
  it('creates the subclass for each code', () => {
    expect(ErrorFactory.create(ErrorCode.ProviderConfiguration, 'x', 'p')).toBeInstanceOf(ProviderConfigurationError);
    expect(ErrorFactory.create(ErrorCode.ProviderProcessing, 'x', 'p')).toBeInstanceOf(ProviderProcessingError);
    expect(ErrorFactory.create(ErrorCode.InvalidManifest, 'x', 'p')).toBeInstanceOf(InvalidManifestError);
    expect(ErrorFactory.create(ErrorCode.Internal, 'x', 'p')).toBeInstanceOf(InternalError);
  });

  it('reads codes back', () => {
    expect(ErrorFactory.getErrorCode(new ProviderProcessingError('decode failed', 'png'))).toBe(
      ErrorCode.ProviderProcessing
    );
    expect(ErrorFactory.getErrorCode(new Error('plain'))).toBeNull();
  });

  it('describes anything thrown', () => {
    expect(ErrorFactory.describe(new Error('boom'))).toBe('boom');
    expect(ErrorFactory.describe('text')).toBe('text');
  });
});

describe('SpindleError', () => {
  it('carries provider, context and cause', () => {
    const cause = new TypeError('bad input');
    const error = new ProviderConfigurationError('cannot build', 'png', { index: 2 }, cause);

    expect(error.name).toBe('ProviderConfigurationError');
    expect(error.providerName).toBe('png');
    expect(error.causeType).toBe('TypeError');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ index: 2 });
  });

  it('serializes for structured logs', () => {
    const error = new ProviderConfigurationError('cannot build', 'png', { index: 2 }, new TypeError('bad input'));

    expect(error.toJSON()).toEqual({
      name: 'ProviderConfigurationError',
      code: 'PROVIDER_CONFIGURATION',
      message: 'cannot build',
      providerName: 'png',
      causeType: 'TypeError',
      cause: 'bad input',
      context: { index: 2 },
      timestamp: error.timestamp.toISOString()
    });
  });

  it('has no cause when none is given', () => {
    const error = new ProviderProcessingError('decode failed', 'png');

    expect(error.cause).toBeUndefined();
    expect(error.causeType).toBe('Unknown');
  });
});
