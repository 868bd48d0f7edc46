/**
 * ModelFilter — Attribute predicates over model metadata.
 *
 * A condition holds when the model's value for the field matches one of
 * the expected values: list fields match when they contain one, single
 * fields when they equal one. Conditions are combined with all/any.
 */

import { InvalidArgumentError } from '../errors.js';
import { isMetadataField, type MetadataField, type ModelMetadata } from '../model/metadata.js';

export type FilterCombinator = 'all' | 'any';

export interface FilterCondition {
  field: MetadataField;
  /** A list is an OR within the field */
  expected: string | readonly string[];
}

export interface ModelFilter {
  combinator: FilterCombinator;
  conditions: readonly FilterCondition[];
}

/** Field name → expected value or values */
export type FilterValues = Readonly<Record<string, string | readonly string[]>>;

/**
 * Map the `and` / `or` operand onto a combinator.
 */
export function parseCombinator(operand: string): FilterCombinator {
  switch (operand) {
    case 'and':
      return 'all';
    case 'or':
      return 'any';
    default:
      throw new InvalidArgumentError(`Invalid operand '${operand}'. Use 'and' or 'or'.`);
  }
}

/**
 * Build a filter from field → expected values.
 *
 * An unknown field name is rejected up front rather than treated as a
 * field no model has; under `or` it would otherwise match nothing while
 * the remaining fields still selected models.
 *
 * @throws InvalidArgumentError on another operand or an unknown field
 */
export function buildFilter(operand: string, filters: FilterValues): ModelFilter {
  const combinator = parseCombinator(operand);
  const conditions: FilterCondition[] = [];

  for (const [field, expected] of Object.entries(filters)) {
    if (!isMetadataField(field)) {
      throw new InvalidArgumentError(`Unknown metadata field '${field}'`);
    }
    conditions.push({ field, expected });
  }

  return { combinator, conditions };
}

function toList(value: string | readonly string[]): readonly string[] {
  return typeof value === 'string' ? [value] : value;
}

export function matchesCondition(metadata: ModelMetadata, condition: FilterCondition): boolean {
  const actual = metadata[condition.field];
  if (actual === undefined) {
    return false;
  }

  const expected = toList(condition.expected);
  if (Array.isArray(actual)) {
    const values: readonly string[] = actual;
    return expected.some(value => values.includes(value));
  }
  return expected.includes(actual);
}

/**
 * An empty `all` filter matches every model; an empty `any` filter none.
 */
export function matchesFilter(metadata: ModelMetadata, filter: ModelFilter): boolean {
  return filter.combinator === 'all'
    ? filter.conditions.every(condition => matchesCondition(metadata, condition))
    : filter.conditions.some(condition => matchesCondition(metadata, condition));
}
