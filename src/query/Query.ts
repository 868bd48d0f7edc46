/**
 * Query — A SPARQL query loaded from a file.
 *
 * The hash is a SHA-256 of the exact text, so it is stable across loads
 * and processes. Two files with the same text share a hash; two queries
 * with different text never do, even when their results coincide.
 */

import { readFile, readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { sha256Hex } from '../hash/contentHash.js';
import { IOError, NotFoundError, describeError, errnoCode } from '../errors.js';

/**
 * File extensions recognized as query files.
 */
export const QUERY_EXTENSIONS: readonly string[] = ['.sparql', '.rq', '.txt'];

export class Query {
  /** Display name; also the stem of the result file */
  readonly name: string;
  /** Raw query text */
  readonly text: string;
  /** SHA-256 hex digest of `text` */
  readonly hash: string;
  /** Source file, when loaded from disk */
  readonly path: string | undefined;

  private constructor(name: string, text: string, path?: string) {
    this.name = name;
    this.text = text;
    this.hash = sha256Hex(text);
    this.path = path;
  }

  /**
   * Load a query from a UTF-8 file. The name is the file name without
   * its extension.
   *
   * @throws NotFoundError when the file does not exist
   * @throws IOError on any other read failure
   */
  static async load(filePath: string): Promise<Query> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(`Query file ${filePath} not found.`, { cause: err });
      }
      throw new IOError(`Failed to read query file ${filePath}: ${describeError(err)}`, { cause: err });
    }
    return new Query(basename(filePath, extname(filePath)), text, filePath);
  }

  /**
   * Build a query from text held in memory.
   */
  static fromText(name: string, text: string): Query {
    return new Query(name, text);
  }
}

/**
 * Load every query file in a directory, in directory-listing order.
 * Subdirectories and files without a query extension are ignored.
 *
 * @throws NotFoundError when the directory does not exist
 */
export async function loadAllQueries(directory: string): Promise<Query[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new NotFoundError(`Directory ${directory} not found.`, { cause: err });
    }
    throw new IOError(`Failed to list query directory ${directory}: ${describeError(err)}`, { cause: err });
  }

  const queries: Query[] = [];
  for (const entry of entries) {
    if (entry.isFile() && QUERY_EXTENSIONS.includes(extname(entry.name).toLowerCase())) {
      queries.push(await Query.load(join(directory, entry.name)));
    }
  }
  return queries;
}
