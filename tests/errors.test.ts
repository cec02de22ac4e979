/**
 * Error System Tests — Normalization + fix instructions
 */

import { describe, it, expect } from 'vitest';
import { DocSchemaError, ERROR_FATAL, errorMessage, mapMongoError } from '../src/errors.js';

describe('DocSchemaError', () => {
  it('creates error with all fields', () => {
    const err = new DocSchemaError({
      code: 'SAMPLING_FAILED',
      message: 'Cursor closed',
      fix: 'Retry the run',
      collection: 'users',
    });

    expect(err.code).toBe('SAMPLING_FAILED');
    expect(err.collection).toBe('users');
    expect(err.fatal).toBe(false);
    expect(err.fix).toBe('Retry the run');
    expect(err.message).toBe('Cursor closed Fix: Retry the run');
    expect(err.timestamp).toBeInstanceOf(Date);
    expect(err.name).toBe('DocSchemaError');
  });

  it('derives fatality from the code', () => {
    expect(new DocSchemaError({ code: 'WRITE_FAILED', message: 'test', fix: 'fix' }).fatal).toBe(true);
    expect(new DocSchemaError({ code: 'EXTERNAL_SERVICE_FAILED', message: 'test', fix: 'fix' }).fatal).toBe(false);
  });

  it('only recovers locally from sampling, service and timeout errors', () => {
    const recoverable = Object.entries(ERROR_FATAL).filter(([, fatal]) => !fatal).map(([code]) => code);
    expect(recoverable).toEqual(['SAMPLING_FAILED', 'EXTERNAL_SERVICE_FAILED', 'TIMEOUT']);
  });
});

describe('mapMongoError', () => {
  it('maps code 18 to AUTHENTICATION_FAILED', () => {
    const err = mapMongoError({ code: 18, message: 'Authentication failed.' });
    expect(err.code).toBe('AUTHENTICATION_FAILED');
    expect(err.fatal).toBe(true);
  });

  it('maps ECONNREFUSED to CONNECTION_FAILED', () => {
    expect(mapMongoError(new Error('connect ECONNREFUSED 127.0.0.1:27017')).code).toBe('CONNECTION_FAILED');
  });

  it('maps ENOTFOUND to CONNECTION_FAILED', () => {
    expect(mapMongoError(new Error('getaddrinfo ENOTFOUND mongo.internal')).code).toBe('CONNECTION_FAILED');
  });

  it('maps server selection timeouts to CONNECTION_FAILED', () => {
    expect(mapMongoError(new Error('Server selection timed out after 10000 ms')).code).toBe('CONNECTION_FAILED');
  });

  it('maps other timeouts to TIMEOUT', () => {
    const err = mapMongoError({ message: 'operation exceeded time limit: maxTimeMS' }, 'orders');
    expect(err.code).toBe('TIMEOUT');
    expect(err.collection).toBe('orders');
    expect(err.fatal).toBe(false);
  });

  it('falls back to INTERNAL_ERROR', () => {
    const err = mapMongoError({ message: 'something weird' }, 'orders');
    expect(err.code).toBe('INTERNAL_ERROR');
    expect(err.message).toContain('MongoDB error on "orders": something weird');
  });

  it('returns DocSchemaError as-is', () => {
    const original = new DocSchemaError({ code: 'WRITE_FAILED', message: 'x', fix: 'y' });
    expect(mapMongoError(original)).toBe(original);
  });
});

describe('errorMessage', () => {
  it('reads message properties and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage({ message: 'plain' })).toBe('plain');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});
