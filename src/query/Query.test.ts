/**
 * Tests for query loading.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Query, loadAllQueries } from './Query.js';
import { sha256Hex } from '../hash/contentHash.js';
import { NotFoundError } from '../errors.js';
import { makeTempDir, removeTempDir } from '../testing/fixtures.js';

const TEXT = 'SELECT ?s WHERE { ?s ?p ?o }';

describe('Query', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('query');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('loads name, text and hash from a file', async () => {
    const file = join(dir, 'all_triples.sparql');
    await writeFile(file, TEXT);

    const query = await Query.load(file);
    expect(query.name).toBe('all_triples');
    expect(query.text).toBe(TEXT);
    expect(query.hash).toBe(sha256Hex(TEXT));
    expect(query.path).toBe(file);
  });

  it('gives identical text the same hash and different text another', () => {
    expect(Query.fromText('a', TEXT).hash).toBe(Query.fromText('b', TEXT).hash);
    expect(Query.fromText('a', TEXT).hash).not.toBe(Query.fromText('a', `${TEXT} LIMIT 1`).hash);
  });

  it('raises NotFound for a missing file', async () => {
    await expect(Query.load(join(dir, 'missing.sparql'))).rejects.toBeInstanceOf(NotFoundError);
  });

  describe('loadAllQueries', () => {
    it('loads query files and ignores everything else', async () => {
      await writeFile(join(dir, 'one.sparql'), TEXT);
      await writeFile(join(dir, 'two.rq'), TEXT);
      await writeFile(join(dir, 'notes.md'), '# not a query');
      await mkdir(join(dir, 'nested.sparql'));

      const queries = await loadAllQueries(dir);
      expect(queries.map(query => query.name).sort()).toEqual(['one', 'two']);
    });

    it('returns an empty list for an empty directory', async () => {
      expect(await loadAllQueries(dir)).toEqual([]);
    });

    it('raises NotFound for a missing directory', async () => {
      await expect(loadAllQueries(join(dir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
