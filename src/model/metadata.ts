/**
 * Model metadata — the fixed record read from a model's metadata.yaml.
 *
 * `mapMetadata` is the only way raw YAML becomes a ModelMetadata. It maps
 * field by field and reports every problem at once instead of stopping
 * at the first.
 */

import { z } from 'zod';
import {
  DEVELOPMENT_CONTEXT,
  ONTOLOGY_TYPE,
  PURPOSE,
  REPRESENTATION_STYLE,
  matchVocabulary,
  type OntologyDevelopmentContext,
  type OntologyPurpose,
  type OntologyRepresentationStyle,
  type OntologyType,
  type Vocabulary,
} from './enumerations.js';

export interface ModelMetadata {
  title: string;
  keyword: string[];
  acronym?: string;
  /** Publication, organization or project the model comes from */
  source?: string;
  /** IANA language subtag of the lexical labels, e.g. "en" */
  language?: string;
  designedForTask: OntologyPurpose[];
  context: OntologyDevelopmentContext[];
  representationStyle?: OntologyRepresentationStyle;
  ontologyType?: OntologyType;
  theme?: string;
  contributor?: string;
  editorialNote?: string;
  issued?: string;
  landingPage?: string;
  license?: string;
  modified?: string;
}

export type MetadataField = keyof ModelMetadata;

export const LIST_FIELDS = ['keyword', 'designedForTask', 'context'] as const;

export const SINGLE_FIELDS = [
  'title',
  'acronym',
  'source',
  'language',
  'representationStyle',
  'ontologyType',
  'theme',
  'contributor',
  'editorialNote',
  'issued',
  'landingPage',
  'license',
  'modified',
] as const;

export const METADATA_FIELDS: readonly MetadataField[] = [...SINGLE_FIELDS, ...LIST_FIELDS];

export function isMetadataField(value: string): value is MetadataField {
  return METADATA_FIELDS.some(field => field === value);
}

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const scalarOrList = z.union([scalar, z.array(scalar)]).nullish();

/**
 * Shape check only: every known field is a scalar or a list of scalars.
 * Unknown keys are kept and ignored.
 */
const RawMetadataSchema = z
  .object({
    title: scalarOrList,
    keyword: scalarOrList,
    acronym: scalarOrList,
    source: scalarOrList,
    language: scalarOrList,
    designedForTask: scalarOrList,
    context: scalarOrList,
    representationStyle: scalarOrList,
    ontologyType: scalarOrList,
    theme: scalarOrList,
    contributor: scalarOrList,
    editorialNote: scalarOrList,
    issued: scalarOrList,
    landingPage: scalarOrList,
    license: scalarOrList,
    modified: scalarOrList,
  })
  .passthrough();

type RawValue = z.infer<typeof scalarOrList>;

export type MetadataMappingResult =
  | { success: true; metadata: ModelMetadata }
  | { success: false; errors: string[] };

function toList(value: RawValue): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  return (Array.isArray(value) ? value : [value]).map(String);
}

/**
 * Map raw YAML into ModelMetadata.
 *
 * - single-valued fields take at most one value; a one-item list is unwrapped
 * - list fields take a lone scalar as a one-item list
 * - enumerated fields must match their vocabulary
 * - title is required
 */
export function mapMetadata(raw: unknown): MetadataMappingResult {
  const parsed = RawMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
    };
  }

  const data = parsed.data;
  const errors: string[] = [];

  const single = (field: (typeof SINGLE_FIELDS)[number]): string | undefined => {
    const values = toList(data[field]);
    if (values.length > 1) {
      errors.push(`${field}: expected at most one value, got ${values.length}`);
      return undefined;
    }
    return values[0];
  };

  const member = <T extends string>(field: MetadataField, vocabulary: Vocabulary<T>, value: string): T | undefined => {
    const matched = matchVocabulary(vocabulary, value);
    if (matched === undefined) {
      errors.push(`${field}: '${value}' is not a valid ${vocabulary.name}`);
    }
    return matched;
  };

  const members = <T extends string>(field: (typeof LIST_FIELDS)[number], vocabulary: Vocabulary<T>): T[] => {
    const matched: T[] = [];
    for (const value of toList(data[field])) {
      const found = member(field, vocabulary, value);
      if (found !== undefined) {
        matched.push(found);
      }
    }
    return matched;
  };

  const title = single('title');
  if (title === undefined && toList(data.title).length === 0) {
    errors.push('title: missing');
  }

  const metadata: ModelMetadata = {
    title: title ?? '',
    keyword: toList(data.keyword),
    designedForTask: members('designedForTask', PURPOSE),
    context: members('context', DEVELOPMENT_CONTEXT),
  };

  const style = single('representationStyle');
  if (style !== undefined) {
    const matched = member('representationStyle', REPRESENTATION_STYLE, style);
    if (matched !== undefined) metadata.representationStyle = matched;
  }

  const ontologyType = single('ontologyType');
  if (ontologyType !== undefined) {
    const matched = member('ontologyType', ONTOLOGY_TYPE, ontologyType);
    if (matched !== undefined) metadata.ontologyType = matched;
  }

  const plainFields = [
    'acronym',
    'source',
    'language',
    'theme',
    'contributor',
    'editorialNote',
    'issued',
    'landingPage',
    'license',
    'modified',
  ] as const;
  for (const field of plainFields) {
    const value = single(field);
    if (value !== undefined) {
      metadata[field] = value;
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, metadata };
}
