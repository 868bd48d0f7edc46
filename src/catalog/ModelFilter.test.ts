/**
 * Tests for metadata filters.
 */

import { describe, it, expect } from 'vitest';
import { buildFilter, matchesCondition, matchesFilter, parseCombinator } from './ModelFilter.js';
import { InvalidArgumentError } from '../errors.js';
import type { ModelMetadata } from '../model/metadata.js';

const metadata: ModelMetadata = {
  title: 'Alpha',
  keyword: ['safety', 'transport'],
  language: 'en',
  designedForTask: [],
  context: ['Research'],
};

describe('parseCombinator', () => {
  it('maps and/or', () => {
    expect(parseCombinator('and')).toBe('all');
    expect(parseCombinator('or')).toBe('any');
  });

  it('rejects other operands', () => {
    expect(() => parseCombinator('xor')).toThrow(InvalidArgumentError);
    expect(() => parseCombinator('AND')).toThrow("Invalid operand 'AND'. Use 'and' or 'or'.");
  });
});

describe('buildFilter', () => {
  it('keeps the fields in order', () => {
    expect(buildFilter('or', { language: 'en', keyword: ['a', 'b'] })).toEqual({
      combinator: 'any',
      conditions: [
        { field: 'language', expected: 'en' },
        { field: 'keyword', expected: ['a', 'b'] },
      ],
    });
  });

  it('rejects unknown fields', () => {
    expect(() => buildFilter('and', { colour: 'red' })).toThrow("Unknown metadata field 'colour'");
    expect(() => buildFilter('or', { language: 'en', colour: 'red' })).toThrow(InvalidArgumentError);
  });
});

describe('matchesCondition', () => {
  it('matches a list field by containment', () => {
    expect(matchesCondition(metadata, { field: 'keyword', expected: 'safety' })).toBe(true);
    expect(matchesCondition(metadata, { field: 'keyword', expected: 'health' })).toBe(false);
  });

  it('matches a scalar field by equality', () => {
    expect(matchesCondition(metadata, { field: 'language', expected: 'en' })).toBe(true);
    expect(matchesCondition(metadata, { field: 'language', expected: 'english' })).toBe(false);
  });

  it('treats an expected list as any of its values', () => {
    expect(matchesCondition(metadata, { field: 'language', expected: ['pt', 'en'] })).toBe(true);
    expect(matchesCondition(metadata, { field: 'keyword', expected: ['health', 'transport'] })).toBe(true);
    expect(matchesCondition(metadata, { field: 'keyword', expected: [] })).toBe(false);
  });

  it('never matches an absent field', () => {
    expect(matchesCondition(metadata, { field: 'acronym', expected: 'A' })).toBe(false);
  });
});

describe('matchesFilter', () => {
  it('all requires every condition', () => {
    expect(matchesFilter(metadata, buildFilter('and', { language: 'en', keyword: 'safety' }))).toBe(true);
    expect(matchesFilter(metadata, buildFilter('and', { language: 'en', keyword: 'health' }))).toBe(false);
  });

  it('any requires one condition', () => {
    expect(matchesFilter(metadata, buildFilter('or', { language: 'pt', keyword: 'safety' }))).toBe(true);
    expect(matchesFilter(metadata, buildFilter('or', { language: 'pt', keyword: 'health' }))).toBe(false);
  });

  it('an empty all matches and an empty any does not', () => {
    expect(matchesFilter(metadata, { combinator: 'all', conditions: [] })).toBe(true);
    expect(matchesFilter(metadata, { combinator: 'any', conditions: [] })).toBe(false);
  });
});
