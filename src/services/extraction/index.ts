/**
 * Extraction Module - Public API
 */

import { extname } from 'path';
import type { SourceKind } from '../../models/document.js';
import { TabularExtractor } from './tabular.js';
import { UnstructuredTextExtractor, type UnstructuredExtractorOptions } from './unstructured.js';
import type { Extractor } from './types.js';

export { ExtractionError } from './errors.js';
export type { ExtractionErrorCode } from './errors.js';
export type { ExtractionInput, ExtractedRow, ParsedDocument, Extractor } from './types.js';
export { TabularExtractor, classifyRow, entityFromFileName, normalizeHeader } from './tabular.js';
export {
  UnstructuredTextExtractor,
  classifyText,
  readMeasurementTable,
  DEFAULT_MIN_TEXT_FIELDS,
  DEFAULT_MIN_TEXT_LENGTH,
} from './unstructured.js';
export type { Classification, UnstructuredExtractorOptions } from './unstructured.js';
export { DefaultTextSource } from './text-source.js';
export type { TextSource, TextSourceInput } from './text-source.js';

export interface ExtractorSet {
  tabular: Extractor;
  text: Extractor;
}

export function createExtractors(options: UnstructuredExtractorOptions = {}): ExtractorSet {
  return {
    tabular: new TabularExtractor(),
    text: new UnstructuredTextExtractor(options),
  };
}

/**
 * TABULAR and UNSTRUCTURED map directly; MANUAL uploads go by extension
 */
export function selectExtractor(
  extractors: ExtractorSet,
  sourceKind: SourceKind,
  fileName: string
): Extractor {
  switch (sourceKind) {
    case 'TABULAR':
      return extractors.tabular;
    case 'UNSTRUCTURED':
      return extractors.text;
    case 'MANUAL':
      return extname(fileName).toLowerCase() === '.csv' ? extractors.tabular : extractors.text;
  }
}
