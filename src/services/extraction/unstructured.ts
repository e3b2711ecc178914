/**
 * Unstructured-text extractor for report documents (NCR reports,
 * inspection certificates, maintenance work orders)
 *
 * Classifies the document, then reads one field map out of the text with
 * line-anchored "Label: value" patterns, a measurement table reading and
 * loosely-anchored numeric patterns.
 *
 * @module extraction/unstructured
 */

import { basename, extname } from 'path';
import type { EntityKind } from '../../models/records.js';
import { ExtractionError } from './errors.js';
import { DefaultTextSource, type TextSource } from './text-source.js';
import type { ExtractedRow, ExtractionInput, Extractor, ParsedDocument } from './types.js';

export const DEFAULT_MIN_TEXT_LENGTH = 50;
export const DEFAULT_MIN_TEXT_FIELDS = 3;

/** NCR marker must appear this early to count */
const NCR_MARKER_WINDOW = 500;

interface LabelSpec {
  field: string;
  /** Regex alternation of accepted labels */
  labels: string;
}

const ID_SUFFIX = '(?:ID|Number|No\\.?)';

const LABELS: Readonly<Record<EntityKind, readonly LabelSpec[]>> = {
  ncr: [
    { field: 'ncr_id', labels: `NCR ${ID_SUFFIX}` },
    { field: 'linked_inspection_id', labels: '(?:Linked |Related )?Inspection (?:ID|Ref(?:erence)?)' },
    { field: 'site', labels: 'Site|Location' },
    { field: 'supplier', labels: 'Supplier' },
    { field: 'part_number', labels: `Part ${ID_SUFFIX}` },
    { field: 'part_description', labels: 'Part Description' },
    { field: 'severity', labels: 'Severity' },
    { field: 'status', labels: 'Status' },
    { field: 'description', labels: 'Description' },
    { field: 'root_cause', labels: 'Root Cause' },
    { field: 'corrective_action', labels: 'Corrective Action' },
    { field: 'opened_at', labels: 'Opened(?: At| Date)?|Date Opened' },
    { field: 'reviewed_at', labels: 'Reviewed(?: At| Date)?' },
    { field: 'closed_at', labels: 'Closed(?: At| Date)?' },
  ],
  inspection: [
    { field: 'inspection_id', labels: `(?:Inspection|Certificate) ${ID_SUFFIX}` },
    { field: 'site', labels: 'Site(?: Location)?' },
    { field: 'production_line', labels: 'Production Line' },
    { field: 'supplier', labels: 'Supplier' },
    { field: 'part_number', labels: `Part ${ID_SUFFIX}` },
    { field: 'part_description', labels: 'Part Description|Description' },
    { field: 'inspector', labels: 'Inspector' },
    { field: 'inspection_date', labels: 'Inspection Date|Date' },
    { field: 'result', labels: '(?:Inspection )?Result' },
    { field: 'measurement_unit', labels: 'Unit' },
    { field: 'notes', labels: 'Notes|Remarks' },
  ],
  maintenance: [
    { field: 'event_id', labels: `(?:Event|Work Order) ${ID_SUFFIX}` },
    { field: 'site', labels: 'Site|Location' },
    { field: 'machine_id', labels: 'Machine ID' },
    { field: 'machine_description', labels: '(?:Machine )?Description' },
    { field: 'event_type', labels: '(?:Event |Maintenance )?Type' },
    { field: 'event_date', labels: 'Event Date|Date' },
    { field: 'technician', labels: 'Technician' },
    { field: 'parts_replaced', labels: 'Parts Replaced' },
    { field: 'notes', labels: 'Notes|Remarks' },
  ],
};

const KEY_FIELDS: Readonly<Record<EntityKind, string>> = {
  inspection: 'inspection_id',
  ncr: 'ncr_id',
  maintenance: 'event_id',
};

const NUMBER = '(\\d+(?:\\.\\d+)?)';

const LOOSE_NUMERIC: Readonly<Record<EntityKind, ReadonlyArray<readonly [string, RegExp]>>> = {
  inspection: [
    ['measurement_value', new RegExp(`(?:Measured Value|Dimension)[^\\n\\d]*${NUMBER}`, 'i')],
    ['spec_min', new RegExp(`Spec Min[^\\n\\d]*${NUMBER}`, 'i')],
    ['spec_max', new RegExp(`Spec Max[^\\n\\d]*${NUMBER}`, 'i')],
  ],
  ncr: [],
  maintenance: [['downtime_hours', new RegExp(`Downtime[^\\n\\d]*${NUMBER}`, 'i')]],
};

const TABLE_COLUMNS: ReadonlyMap<string, string> = new Map([
  ['measured value', 'measurement_value'],
  ['unit', 'measurement_unit'],
  ['spec min', 'spec_min'],
  ['spec max', 'spec_max'],
]);

const WORK_DESCRIPTION = /WORK DESCRIPTION[ \t]*:?\s+([\s\S]+?)(?:\n[ \t]*\n|PARTS|$)/i;

const KEY_FROM_FILE_NAME = /^[A-Za-z]+-[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface Classification {
  entity: EntityKind;
  signal: 'file_name' | 'keyword';
}

/**
 * Document type by file name prefix, falling back to keyword search
 *
 * @throws ExtractionError UNCLASSIFIABLE_DOCUMENT when nothing matches,
 *   LOW_CONFIDENCE_EXTRACTION when keywords of several types match
 */
export function classifyText(fileName: string, text: string): Classification {
  const name = basename(fileName).toLowerCase();
  if (name.startsWith('ncr')) {
    return { entity: 'ncr', signal: 'file_name' };
  }
  if (name.startsWith('ins')) {
    return { entity: 'inspection', signal: 'file_name' };
  }
  if (name.startsWith('mnt') || name.startsWith('maint')) {
    return { entity: 'maintenance', signal: 'file_name' };
  }

  const upper = text.toUpperCase();
  const matches: EntityKind[] = [];
  if (upper.includes('NON-CONFORMANCE') || /\bNCR\b/.test(upper.slice(0, NCR_MARKER_WINDOW))) {
    matches.push('ncr');
  }
  if (upper.includes('INSPECTION CERTIFICATE')) {
    matches.push('inspection');
  }
  if (upper.includes('WORK ORDER')) {
    matches.push('maintenance');
  }

  if (matches.length === 0) {
    throw new ExtractionError(
      `Could not determine the document type of ${fileName}`,
      'UNCLASSIFIABLE_DOCUMENT',
      fileName
    );
  }
  if (matches.length > 1) {
    throw new ExtractionError(
      `Ambiguous document type for ${fileName}: ${matches.join(', ')}`,
      'LOW_CONFIDENCE_EXTRACTION',
      fileName
    );
  }
  return { entity: matches[0], signal: 'keyword' };
}

function matchLabel(text: string, labels: string): string | null {
  const pattern = new RegExp(`^[ \\t]*(?:${labels})[ \\t]*:[ \\t]*(\\S.*?)[ \\t]*$`, 'im');
  const match = pattern.exec(text);
  return match ? match[1] : null;
}

function splitCells(line: string): string[] {
  if (line.includes('|')) {
    return line
      .trim()
      .replace(/^\||\|$/g, '')
      .split('|')
      .map((cell) => cell.trim());
  }
  return line
    .trim()
    .split(/\t+| {2,}/)
    .map((cell) => cell.trim());
}

/**
 * Reads the first data line under a header naming Measured Value,
 * Spec Min and Spec Max
 */
export function readMeasurementTable(text: string): Map<string, string> {
  const found = new Map<string, string>();
  const lines = text.split('\n');
  const headerIndex = lines.findIndex((line) => {
    const lower = line.toLowerCase();
    return lower.includes('measured value') && lower.includes('spec min') && lower.includes('spec max');
  });
  if (headerIndex < 0) {
    return found;
  }

  const dataLine = lines
    .slice(headerIndex + 1)
    .find((line) => line.trim() !== '' && !/^[\s|:=+-]+$/.test(line));
  if (dataLine === undefined) {
    return found;
  }

  const header = splitCells(lines[headerIndex]).map((cell) => cell.toLowerCase());
  const cells = splitCells(dataLine);
  header.forEach((name, column) => {
    const field = TABLE_COLUMNS.get(name);
    const value = cells[column];
    if (field !== undefined && value !== undefined && value !== '') {
      found.set(field, value);
    }
  });
  return found;
}

export interface UnstructuredExtractorOptions {
  textSource?: TextSource;
  minTextFields?: number;
  minTextLength?: number;
}

export class UnstructuredTextExtractor implements Extractor {
  readonly name = 'unstructured_text';
  private readonly textSource: TextSource;
  private readonly minTextFields: number;
  private readonly minTextLength: number;

  constructor(options: UnstructuredExtractorOptions = {}) {
    this.textSource = options.textSource ?? new DefaultTextSource();
    this.minTextFields = options.minTextFields ?? DEFAULT_MIN_TEXT_FIELDS;
    this.minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  }

  async parse(input: ExtractionInput): Promise<ParsedDocument> {
    const text = (await this.textSource.extractText(input)).replace(/\r\n?/g, '\n');
    if (text.trim().length < this.minTextLength) {
      throw new ExtractionError(
        `Insufficient text extracted from ${input.fileName} (${text.trim().length} characters)`,
        'EMPTY_DOCUMENT',
        input.fileName
      );
    }

    const { entity, signal } = classifyText(input.fileName, text);
    const fields = new Map<string, string>();

    for (const spec of LABELS[entity]) {
      const value = matchLabel(text, spec.labels);
      if (value !== null) {
        fields.set(spec.field, value);
      }
    }
    if (entity === 'inspection') {
      for (const [field, value] of readMeasurementTable(text)) {
        if (!fields.has(field)) {
          fields.set(field, value);
        }
      }
    }
    if (entity === 'maintenance' && !fields.has('description')) {
      const block = WORK_DESCRIPTION.exec(text);
      if (block) {
        fields.set('description', block[1].replace(/\s+/g, ' ').trim());
      }
    }
    const labeledCount = fields.size;

    for (const [field, pattern] of LOOSE_NUMERIC[entity]) {
      if (!fields.has(field)) {
        const match = pattern.exec(text);
        if (match) {
          fields.set(field, match[1]);
        }
      }
    }

    const keyField = KEY_FIELDS[entity];
    let keySource: 'label' | 'file_name' = 'label';
    if (!fields.has(keyField)) {
      const stem = basename(input.fileName, extname(input.fileName));
      if (KEY_FROM_FILE_NAME.test(stem)) {
        fields.set(keyField, stem);
        keySource = 'file_name';
      } else {
        throw new ExtractionError(
          `No ${keyField} found in ${input.fileName}`,
          'LOW_CONFIDENCE_EXTRACTION',
          input.fileName
        );
      }
    }

    if (labeledCount < this.minTextFields) {
      throw new ExtractionError(
        `Only ${labeledCount} labeled field(s) found in ${input.fileName}, need ${this.minTextFields}`,
        'LOW_CONFIDENCE_EXTRACTION',
        input.fileName
      );
    }

    applyDefaults(entity, fields, input.receivedAt);

    const row: ExtractedRow = { entity, fields, position: 1 };
    return {
      entity,
      rowCount: 1,
      metadata: {
        extractor: this.name,
        entity,
        classified_by: signal,
        key_source: keySource,
        labeled_fields: labeledCount,
        text_length: text.length,
      },
      *rows(): IterableIterator<ExtractedRow> {
        yield row;
      },
    };
  }
}

/** Values the report layouts leave out */
function applyDefaults(entity: EntityKind, fields: Map<string, string>, receivedAt: string): void {
  if (entity === 'ncr') {
    if (!fields.has('status')) {
      fields.set('status', 'OPEN');
    }
    if (!fields.has('severity')) {
      fields.set('severity', 'MEDIUM');
    }
    if (!fields.has('opened_at')) {
      fields.set('opened_at', receivedAt);
    }
  }
  if (entity === 'maintenance' && !fields.has('event_type')) {
    fields.set('event_type', 'Preventive');
  }
}
