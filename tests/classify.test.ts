/**
 * Type Classification Tests — sampling mode + render-time simplified mode
 */

import { describe, it, expect } from 'vitest';
import { ObjectId } from 'mongodb';
import { classifyValue, simplifiedType, isPlainObject } from '../src/classify.js';

describe('classifyValue', () => {
  it('classifies scalars', () => {
    expect(classifyValue('hello')).toBe('string');
    expect(classifyValue(true)).toBe('boolean');
    expect(classifyValue(false)).toBe('boolean');
    expect(classifyValue(42)).toBe('integer');
    expect(classifyValue(10n)).toBe('integer');
    expect(classifyValue(3.14)).toBe('float');
  });

  it('classifies arrays by their first element only', () => {
    expect(classifyValue([])).toBe('array');
    expect(classifyValue(['a', 1])).toBe('string[]');
    expect(classifyValue([1, 'a'])).toBe('array');
    expect(classifyValue([{ sku: 'x' }])).toBe('array');
  });

  it('classifies subdocuments as json', () => {
    expect(classifyValue({ city: 'Oslo' })).toBe('json');
    expect(classifyValue(Object.create(null))).toBe('json');
  });

  it('falls back to string for everything else', () => {
    expect(classifyValue(null)).toBe('string');
    expect(classifyValue(undefined)).toBe('string');
    expect(classifyValue(new Date(0))).toBe('string');
    expect(classifyValue(new ObjectId())).toBe('string');
  });
});

describe('simplifiedType', () => {
  it('parameterizes arrays with the first element type', () => {
    expect(simplifiedType([1, 2])).toBe('array<integer>');
    expect(simplifiedType(['a'])).toBe('array<string>');
    expect(simplifiedType([[1.5]])).toBe('array<array<float>>');
    expect(simplifiedType([])).toBe('array');
  });

  it('uses unknown as the fallback', () => {
    expect(simplifiedType(null)).toBe('unknown');
    expect(simplifiedType(new Date(0))).toBe('unknown');
  });

  it('classifies scalars and objects', () => {
    expect(simplifiedType({ a: 1 })).toBe('json');
    expect(simplifiedType(true)).toBe('boolean');
    expect(simplifiedType(7)).toBe('integer');
    expect(simplifiedType(0.5)).toBe('float');
    expect(simplifiedType('x')).toBe('string');
  });
});

describe('isPlainObject', () => {
  it('rejects arrays, null and class instances', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject({})).toBe(true);
  });
});
