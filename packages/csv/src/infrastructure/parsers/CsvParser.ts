import Papa from 'papaparse';
import { CampaignConfigError } from '@cadencekit/core';
import type { JobPayload } from '@cadencekit/core';

export interface CsvParserOptions {
  /** Field delimiter. Default: detected from the first lines. */
  readonly delimiter?: string;
}

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];

/** Pick the delimiter that splits the header line into the most columns. */
export function detectDelimiter(content: string): string {
  const firstLines = content.split('\n').slice(0, 5).join('\n');
  let bestDelimiter = ',';
  let maxColumns = 0;

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
    const firstRow = result.data[0];
    if (firstRow && firstRow.length > maxColumns) {
      maxColumns = firstRow.length;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}

function isBlankRow(row: Readonly<Record<string, unknown>>): boolean {
  return Object.values(row).every((value) => value === undefined || value === null || String(value).trim() === '');
}

/**
 * Parse CSV text with a header line into row payloads using PapaParse.
 *
 * Header names are trimmed, values are kept as strings, and blank rows are
 * dropped, so the position of a row in the result is stable for a given file.
 *
 * @throws CampaignConfigError on unbalanced quotes.
 */
export function parseCsv(content: string, options: CsvParserOptions = {}): JobPayload[] {
  const result = Papa.parse<Record<string, string>>(content, {
    header: true,
    delimiter: options.delimiter ?? detectDelimiter(content),
    skipEmptyLines: 'greedy',
    dynamicTyping: false,
    transformHeader: (header) => header.trim(),
  });

  const fatal = result.errors.find((error) => error.type === 'Quotes');
  if (fatal) {
    const row = fatal.row === undefined ? '' : ` at row ${String(fatal.row + 1)}`;
    throw new CampaignConfigError(`Malformed CSV${row}: ${fatal.message}`);
  }

  return result.data.filter((row) => !isBlankRow(row));
}
