/**
 * Full-text sources for unstructured documents
 *
 * @module extraction/text-source
 */

import { createRequire } from 'module';
import { extname } from 'path';
import { ExtractionError } from './errors.js';

const require = createRequire(import.meta.url);

export interface TextSourceInput {
  fileName: string;
  bytes: Buffer;
}

export interface TextSource {
  extractText(input: TextSourceInput): Promise<string>;
}

type PdfParse = typeof import('pdf-parse');

let pdfParse: PdfParse | null = null;

/** pdf-parse is CommonJS; loaded on first use from lib/ to skip its debug entry point */
function loadPdfParse(): PdfParse {
  if (!pdfParse) {
    const loaded: PdfParse = require('pdf-parse/lib/pdf-parse.js');
    pdfParse = loaded;
  }
  return pdfParse;
}

/**
 * PDF text via pdf-parse, anything else decoded as UTF-8
 */
export class DefaultTextSource implements TextSource {
  async extractText(input: TextSourceInput): Promise<string> {
    if (extname(input.fileName).toLowerCase() === '.pdf') {
      try {
        const result = await loadPdfParse()(input.bytes);
        return result.text;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ExtractionError(
          `Cannot read PDF ${input.fileName}: ${message}`,
          'UNREADABLE_DOCUMENT',
          input.fileName,
          error
        );
      }
    }

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
}
