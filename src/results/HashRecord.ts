/**
 * HashRecord — The `.hashes.csv` file of a results directory.
 *
 * One row per executed (query hash, graph hash) pair. The file is only
 * ever appended to. Concurrent writers from several processes are not
 * coordinated.
 */

import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { IOError, describeError, errnoCode } from '../errors.js';
import { formatCsv, parseCsv } from './csv.js';

export const HASH_RECORD_FILE = '.hashes.csv';

const COLUMNS = ['query_hash', 'graph_hash'] as const;

export interface HashRecordEntry {
  queryHash: string;
  graphHash: string;
}

export class HashRecord {
  readonly filePath: string;

  constructor(resultsDir: string) {
    this.filePath = join(resultsDir, HASH_RECORD_FILE);
  }

  /**
   * All recorded pairs, oldest first. A missing file has none.
   */
  async entries(): Promise<HashRecordEntry[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      const code = errnoCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return [];
      }
      throw new IOError(`Failed to read hash record ${this.filePath}: ${describeError(err)}`, { cause: err });
    }

    return parseCsv(content).rows.map(row => ({
      queryHash: row.query_hash ?? '',
      graphHash: row.graph_hash ?? '',
    }));
  }

  async has(graphHash: string, queryHash: string): Promise<boolean> {
    const entries = await this.entries();
    return entries.some(entry => entry.graphHash === graphHash && entry.queryHash === queryHash);
  }

  /**
   * Append a pair, creating the file with its header on first use.
   */
  async append(graphHash: string, queryHash: string): Promise<void> {
    const row = { query_hash: queryHash, graph_hash: graphHash };
    try {
      await writeFile(this.filePath, formatCsv(COLUMNS, [row]), { encoding: 'utf-8', flag: 'wx' });
      return;
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        throw new IOError(`Failed to create hash record ${this.filePath}: ${describeError(err)}`, { cause: err });
      }
    }

    try {
      await appendFile(this.filePath, `${queryHash},${graphHash}\n`, 'utf-8');
    } catch (err) {
      throw new IOError(`Failed to append to hash record ${this.filePath}: ${describeError(err)}`, { cause: err });
    }
  }
}
