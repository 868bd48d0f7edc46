/**
 * Tests for metadata mapping and vocabularies.
 */

import { describe, it, expect } from 'vitest';
import { isMetadataField, mapMetadata } from './metadata.js';
import { DEVELOPMENT_CONTEXT, PURPOSE, REPRESENTATION_STYLE, matchVocabulary } from './enumerations.js';

describe('matchVocabulary', () => {
  it('ignores case, spaces and underscores', () => {
    expect(matchVocabulary(DEVELOPMENT_CONTEXT, 'research')).toBe('Research');
    expect(matchVocabulary(PURPOSE, 'conceptual clarification')).toBe('ConceptualClarification');
    expect(matchVocabulary(PURPOSE, 'DECISION_SUPPORT_SYSTEM')).toBe('DecisionSupportSystem');
  });

  it('accepts the short representation style names', () => {
    expect(matchVocabulary(REPRESENTATION_STYLE, 'OntoUML')).toBe('OntoumlStyle');
    expect(matchVocabulary(REPRESENTATION_STYLE, 'ufo')).toBe('UfoStyle');
    expect(matchVocabulary(REPRESENTATION_STYLE, 'Ufo Style')).toBe('UfoStyle');
  });

  it('returns undefined for anything else', () => {
    expect(matchVocabulary(DEVELOPMENT_CONTEXT, 'Alien')).toBeUndefined();
  });
});

describe('isMetadataField', () => {
  it('knows the metadata fields', () => {
    expect(isMetadataField('keyword')).toBe(true);
    expect(isMetadataField('language')).toBe(true);
    expect(isMetadataField('color')).toBe(false);
  });
});

describe('mapMetadata', () => {
  it('maps a complete record', () => {
    const result = mapMetadata({
      title: 'Alpha',
      acronym: 'A',
      keyword: ['safety', 'transport'],
      language: 'en',
      context: ['research'],
      designedForTask: 'Learning',
      representationStyle: 'ontouml',
      ontologyType: 'domain',
      issued: 2021,
      unknownKey: 'ignored',
    });

    expect(result).toEqual({
      success: true,
      metadata: {
        title: 'Alpha',
        acronym: 'A',
        keyword: ['safety', 'transport'],
        language: 'en',
        context: ['Research'],
        designedForTask: ['Learning'],
        representationStyle: 'OntoumlStyle',
        ontologyType: 'Domain',
        issued: '2021',
      },
    });
  });

  it('unwraps one-item lists for single fields and wraps scalars for list fields', () => {
    const result = mapMetadata({ title: ['Only'], keyword: 'lonely' });
    expect(result).toEqual({
      success: true,
      metadata: { title: 'Only', keyword: ['lonely'], designedForTask: [], context: [] },
    });
  });

  it('treats null as absent', () => {
    const result = mapMetadata({ title: 'T', keyword: null, language: null });
    expect(result).toEqual({
      success: true,
      metadata: { title: 'T', keyword: [], designedForTask: [], context: [] },
    });
  });

  it('reports every problem at once', () => {
    const result = mapMetadata({
      language: ['en', 'pt'],
      context: ['Alien'],
      representationStyle: 'Baroque',
    });

    expect(result).toEqual({
      success: false,
      errors: [
        'title: missing',
        "context: 'Alien' is not a valid OntologyDevelopmentContext",
        "representationStyle: 'Baroque' is not a valid OntologyRepresentationStyle",
        'language: expected at most one value, got 2',
      ],
    });
  });

  it('reports a title given more than once', () => {
    expect(mapMetadata({ title: ['A', 'B'] })).toEqual({
      success: false,
      errors: ['title: expected at most one value, got 2'],
    });
  });

  it('rejects nested structures through the schema', () => {
    const result = mapMetadata({ title: 'T', keyword: { nested: true } });
    expect(result.success).toBe(false);
    expect(result.success ? [] : result.errors.map(error => error.split(':')[0])).toEqual(['keyword']);
  });
});
