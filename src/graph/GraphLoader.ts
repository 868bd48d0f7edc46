/**
 * GraphLoader — Read RDF files into n3 stores.
 *
 * The serialization is picked from the file extension. Parsing is fully
 * delegated to n3; this module only maps its failures onto the catalog
 * error taxonomy.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Parser, Store } from 'n3';
import { IOError, NotFoundError, ParseError, describeError, errnoCode } from '../errors.js';

/**
 * RDF serializations n3 can parse, keyed by file extension.
 */
const FORMATS_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.ttl': 'Turtle',
  '.turtle': 'Turtle',
  '.nt': 'N-Triples',
  '.nq': 'N-Quads',
  '.trig': 'TriG',
  '.n3': 'N3',
};

export const RDF_EXTENSIONS: readonly string[] = Object.keys(FORMATS_BY_EXTENSION);

/**
 * Guess the serialization of a file from its extension.
 */
export function guessFormat(filePath: string): string | undefined {
  return FORMATS_BY_EXTENSION[extname(filePath).toLowerCase()];
}

/**
 * Parse RDF text into a new store.
 *
 * @throws ParseError when n3 rejects the content
 */
export function parseGraph(content: string, format: string, source: string, baseIRI?: string): Store {
  const parser = new Parser({ format, ...(baseIRI !== undefined ? { baseIRI } : {}) });
  try {
    return new Store(parser.parse(content));
  } catch (err) {
    throw new ParseError(`Error parsing RDF file ${source}: ${describeError(err)}`, source, { cause: err });
  }
}

/**
 * Load an RDF file into a new store.
 *
 * @throws NotFoundError when the file does not exist
 * @throws IOError when it cannot be read
 * @throws ParseError when the format is unknown or the content is malformed
 */
export async function loadGraph(filePath: string): Promise<Store> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new NotFoundError(`Ontology file ${filePath} not found.`, { cause: err });
    }
    throw new IOError(`Failed to read ontology file ${filePath}: ${describeError(err)}`, { cause: err });
  }

  const format = guessFormat(filePath);
  if (format === undefined) {
    throw new ParseError(`Unrecognized RDF format for ${filePath}`, filePath);
  }

  return parseGraph(content, format, filePath, pathToFileURL(filePath).href);
}

/**
 * Union of several stores into a fresh one. Identical triples collapse,
 * as the store holds a set.
 */
export function mergeGraphs(stores: Iterable<Store>): Store {
  const merged = new Store();
  for (const store of stores) {
    merged.addQuads(store.getQuads(null, null, null, null));
  }
  return merged;
}
