/**
 * Closed vocabularies used by model metadata.
 */

export const ONTOLOGY_DEVELOPMENT_CONTEXTS = ['Classroom', 'Industry', 'Research'] as const;
export type OntologyDevelopmentContext = (typeof ONTOLOGY_DEVELOPMENT_CONTEXTS)[number];

export const ONTOLOGY_REPRESENTATION_STYLES = ['OntoumlStyle', 'UfoStyle'] as const;
export type OntologyRepresentationStyle = (typeof ONTOLOGY_REPRESENTATION_STYLES)[number];

export const ONTOLOGY_PURPOSES = [
  'ConceptualClarification',
  'DataPublication',
  'DecisionSupportSystem',
  'Example',
  'InformationRetrieval',
  'Interoperability',
  'LanguageEngineering',
  'Learning',
  'OntologicalAnalysis',
  'SoftwareEngineering',
] as const;
export type OntologyPurpose = (typeof ONTOLOGY_PURPOSES)[number];

export const ONTOLOGY_TYPES = ['Core', 'Domain', 'Application'] as const;
export type OntologyType = (typeof ONTOLOGY_TYPES)[number];

export interface Vocabulary<T extends string> {
  name: string;
  values: readonly T[];
  /** Extra spellings, keyed by their normalized form */
  aliases?: Readonly<Record<string, T>>;
}

export const DEVELOPMENT_CONTEXT: Vocabulary<OntologyDevelopmentContext> = {
  name: 'OntologyDevelopmentContext',
  values: ONTOLOGY_DEVELOPMENT_CONTEXTS,
};

export const REPRESENTATION_STYLE: Vocabulary<OntologyRepresentationStyle> = {
  name: 'OntologyRepresentationStyle',
  values: ONTOLOGY_REPRESENTATION_STYLES,
  aliases: {
    ontouml: 'OntoumlStyle',
    ufo: 'UfoStyle',
  },
};

export const PURPOSE: Vocabulary<OntologyPurpose> = {
  name: 'OntologyPurpose',
  values: ONTOLOGY_PURPOSES,
};

export const ONTOLOGY_TYPE: Vocabulary<OntologyType> = {
  name: 'OntologyType',
  values: ONTOLOGY_TYPES,
};

/**
 * Case-insensitive, with spaces and underscores ignored.
 */
function normalize(value: string): string {
  return value.toLowerCase().replace(/[\s_]/g, '');
}

/**
 * Map a raw metadata value onto a vocabulary member.
 */
export function matchVocabulary<T extends string>(vocabulary: Vocabulary<T>, raw: string): T | undefined {
  const wanted = normalize(raw);
  const member = vocabulary.values.find(value => normalize(value) === wanted);
  if (member !== undefined) {
    return member;
  }
  return vocabulary.aliases?.[wanted];
}
