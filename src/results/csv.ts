/**
 * Minimal RFC 4180 CSV reading and writing for result tables.
 *
 * Fields are quoted only when they contain a comma, a quote or a line
 * break. Lines end with LF.
 */

export interface CsvTable {
  header: string[];
  rows: Array<Record<string, string>>;
}

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Format rows under a header. Columns missing from a row are written empty;
 * keys not in the header are dropped. An empty row list yields the header
 * line alone.
 */
export function formatCsv(header: readonly string[], rows: ReadonlyArray<Readonly<Record<string, string>>>): string {
  const lines = [header.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(header.map(column => escapeCsvField(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Split CSV text into records of raw fields.
 */
export function parseCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const ch = content[i];

    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}

/**
 * Parse CSV text whose first record is the header.
 */
export function parseCsv(content: string): CsvTable {
  const [header = [], ...body] = parseCsvRecords(content);
  const rows = body.map(values => {
    const row: Record<string, string> = {};
    header.forEach((column, index) => {
      row[column] = values[index] ?? '';
    });
    return row;
  });
  return { header, rows };
}
