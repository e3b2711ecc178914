/**
 * Tabular (CSV) extractor
 *
 * The header row gives field names; every following non-blank record
 * becomes one field map, in file order, positioned by its line below the
 * header. The whole file is decoded and
 * parsed up front so undecodable input fails before any row is processed.
 *
 * @module extraction/tabular
 */

import { basename } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { EntityKind } from '../../models/records.js';
import type { FieldMap } from '../normalization/records.js';
import { ExtractionError } from './errors.js';
import type { ExtractedRow, ExtractionInput, Extractor, ParsedDocument } from './types.js';

/** Records parsed with `info: true`; `lines` is the record's line in the file */
const CsvRecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number().int() }),
  })
);

interface CsvRecord {
  values: string[];
  line: number;
}

const RECORD_TYPE_SYNONYMS: ReadonlyMap<string, EntityKind> = new Map<string, EntityKind>([
  ['inspection', 'inspection'],
  ['ins', 'inspection'],
  ['insp', 'inspection'],
  ['ncr', 'ncr'],
  ['non_conformance', 'ncr'],
  ['nonconformance', 'ncr'],
  ['maintenance', 'maintenance'],
  ['maint', 'maintenance'],
  ['mnt', 'maintenance'],
  ['work_order', 'maintenance'],
]);

/** Natural-key columns checked in order when a row has no record_type */
const KEY_COLUMNS: ReadonlyArray<readonly [string, EntityKind]> = [
  ['ncr_id', 'ncr'],
  ['event_id', 'maintenance'],
  ['inspection_id', 'inspection'],
];

export function normalizeHeader(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/** 'ncr' as a whole token, so names like concrete_*.csv do not match */
const NCR_TOKEN = /(^|[^a-z])ncrs?([^a-z]|$)/;

/**
 * Entity implied by a file name, checked as 'inspection', then 'ncr',
 * then 'maint'
 */
export function entityFromFileName(fileName: string): EntityKind | null {
  const lower = basename(fileName).toLowerCase();
  if (lower.includes('inspection')) {
    return 'inspection';
  }
  if (NCR_TOKEN.test(lower)) {
    return 'ncr';
  }
  if (lower.includes('maint')) {
    return 'maintenance';
  }
  return null;
}

/**
 * Entity of a single row: record_type column first, then the first filled
 * natural-key column
 */
export function classifyRow(fields: FieldMap): EntityKind | null {
  const recordType = fields.get('record_type');
  if (recordType !== undefined && recordType.trim() !== '') {
    return RECORD_TYPE_SYNONYMS.get(normalizeHeader(recordType)) ?? null;
  }
  for (const [column, entity] of KEY_COLUMNS) {
    const value = fields.get(column);
    if (value !== undefined && value.trim() !== '') {
      return entity;
    }
  }
  return null;
}

function decode(input: ExtractionInput): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input.bytes);
  } catch (error) {
    throw new ExtractionError(
      `Cannot decode ${input.fileName} as UTF-8`,
      'UNREADABLE_DOCUMENT',
      input.fileName,
      error
    );
  }
}

function readRecords(input: ExtractionInput, content: string): CsvRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
      trim: true,
      bom: true,
      relax_column_count: true,
      relax_quotes: false,
      info: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(
      `Malformed CSV in ${input.fileName}: ${message}`,
      'UNREADABLE_DOCUMENT',
      input.fileName,
      error
    );
  }

  const result = CsvRecordsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ExtractionError(
      `Unexpected CSV structure in ${input.fileName}`,
      'UNREADABLE_DOCUMENT',
      input.fileName
    );
  }
  return result.data.map(({ record, info }) => ({ values: record, line: info.lines }));
}

export class TabularExtractor implements Extractor {
  readonly name = 'tabular';

  async parse(input: ExtractionInput): Promise<ParsedDocument> {
    const records = readRecords(input, decode(input));
    if (records.length === 0) {
      throw new ExtractionError(`${input.fileName} has no header row`, 'EMPTY_DOCUMENT', input.fileName);
    }

    const [headerRecord, ...dataRecords] = records;
    const header = headerRecord.values.map(normalizeHeader);
    const documentEntity = entityFromFileName(input.fileName);

    // Positions count file lines after the header, skipped lines included
    const toRow = ({ values, line }: CsvRecord): ExtractedRow => {
      const fields = new Map<string, string>();
      header.forEach((name, column) => {
        if (name !== '' && !fields.has(name) && column < values.length) {
          fields.set(name, values[column]);
        }
      });
      return {
        entity: documentEntity ?? classifyRow(fields),
        fields,
        position: line - headerRecord.line,
      };
    };

    return {
      entity: documentEntity,
      rowCount: dataRecords.length,
      metadata: {
        extractor: this.name,
        columns: header,
        row_count: dataRecords.length,
        entity: documentEntity,
      },
      *rows(): IterableIterator<ExtractedRow> {
        for (const record of dataRecords) {
          yield toRow(record);
        }
      },
    };
  }
}
