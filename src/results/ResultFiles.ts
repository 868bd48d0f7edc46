/**
 * Result files written under a results directory.
 *
 * Layout:
 * - `<dir>/<query>.csv` — bindings of one query against one graph
 * - `<dir>/.hashes.csv` — executed pairs (see HashRecord)
 * - `<dir>/<query>_compiled.csv` — per-model results gathered by a catalog fan-out
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  IOError,
  InvalidArgumentError,
  NotFoundError,
  describeError,
  errnoCode,
} from '../errors.js';
import { formatCsv, parseCsv, type CsvTable } from './csv.js';

export const MODEL_ID_COLUMN = 'model_id';

const UNSAFE_NAME = /[\\/]|^\.\.?$/;

// would shadow the hash record, or a compiled file of another query
const RESERVED_QUERY_NAME = /^\.|_compiled$/;

function assertSafeName(name: string, what: string): void {
  if (name.length === 0 || UNSAFE_NAME.test(name)) {
    throw new InvalidArgumentError(`Invalid ${what} for a result file name: '${name}'`);
  }
}

/**
 * @throws InvalidArgumentError when the name cannot name a result file
 */
export function assertQueryName(name: string): void {
  assertSafeName(name, 'query name');
  if (RESERVED_QUERY_NAME.test(name)) {
    throw new InvalidArgumentError(
      `Query name '${name}' is reserved: it may not start with '.' or end in '_compiled'`
    );
  }
}

/**
 * Create the results directory and its parents.
 *
 * @throws NotFoundError when it cannot be created
 */
export async function ensureResultsDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new NotFoundError(`Results directory ${dir} cannot be created: ${describeError(err)}`, { cause: err });
  }
}

export function resultFilePath(dir: string, queryName: string): string {
  assertQueryName(queryName);
  return join(dir, `${queryName}.csv`);
}

export function compiledResultFilePath(dir: string, queryName: string): string {
  assertQueryName(queryName);
  return join(dir, `${queryName}_compiled.csv`);
}

/**
 * Directory holding one model's results inside a fan-out results directory.
 */
export function modelResultsDir(dir: string, modelId: string): string {
  assertSafeName(modelId, 'model id');
  return join(dir, modelId);
}

async function writeText(filePath: string, content: string): Promise<void> {
  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (err) {
    throw new IOError(`Failed to write ${filePath}: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Write the bindings of a query. Columns follow `variables`.
 */
export async function writeResultFile(
  dir: string,
  queryName: string,
  variables: readonly string[],
  bindings: ReadonlyArray<Readonly<Record<string, string>>>
): Promise<string> {
  const filePath = resultFilePath(dir, queryName);
  await writeText(filePath, formatCsv(variables, bindings));
  return filePath;
}

/**
 * Read a result file back; null when it does not exist.
 */
export async function readResultFile(filePath: string): Promise<CsvTable | null> {
  try {
    return parseCsv(await readFile(filePath, 'utf-8'));
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return null;
    }
    throw new IOError(`Failed to read ${filePath}: ${describeError(err)}`, { cause: err });
  }
}

export interface ModelResultTable {
  modelId: string;
  table: CsvTable;
}

/**
 * Gather per-model tables into one file: `model_id` first, then the union
 * of the per-model columns in first-seen order.
 *
 * @returns the written path, or null when there is nothing to compile
 */
export async function writeCompiledResults(
  dir: string,
  queryName: string,
  tables: readonly ModelResultTable[]
): Promise<string | null> {
  if (tables.length === 0) {
    return null;
  }

  const columns: string[] = [MODEL_ID_COLUMN];
  for (const { table } of tables) {
    for (const column of table.header) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }

  const rows = tables.flatMap(({ modelId, table }) =>
    table.rows.map(row => ({ ...row, [MODEL_ID_COLUMN]: modelId }))
  );

  const filePath = compiledResultFilePath(dir, queryName);
  await writeText(filePath, formatCsv(columns, rows));
  return filePath;
}
