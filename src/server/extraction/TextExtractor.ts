/**
 * TextExtractor - Turn a PDF or Word file into plain text
 *
 * Dispatches on the file extension. Backends are checked once when the
 * extractor is created; the first available backend per format is used for
 * every call, with no per-call fallback.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { getEnv } from '../config/env.js';
import type { PdfBackendName } from '../config/env.js';
import { LegalDocumentError } from '../types/errors.js';
import { createChildLogger, getLogger } from '../utils/logger.js';
import { DocxExtractor } from './docx/DocxExtractor.js';
import { PdfExtractor } from './pdf/PdfExtractor.js';
import { UnpdfExtractor } from './pdf/UnpdfExtractor.js';
import type { DocumentFormat, TextExtractionBackend } from './types.js';

const FORMAT_BY_EXTENSION: Readonly<Record<string, DocumentFormat>> = Object.freeze({
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.doc': 'docx',
});

const FORMAT_LABEL: Record<DocumentFormat, string> = {
  pdf: 'PDF',
  docx: 'DOCX',
};

export interface TextExtractorOptions {
  /** Candidate backends in priority order (defaults to the configured ones) */
  candidates?: TextExtractionBackend[];
  /** File reader; defaults to fs/promises readFile */
  readFile?: (filePath: string) => Promise<Buffer>;
}

/**
 * Default candidates: PDF backends in PDF_BACKENDS order, then mammoth
 */
export function defaultBackendCandidates(
  pdfBackends: readonly PdfBackendName[] = getEnv().PDF_BACKENDS
): TextExtractionBackend[] {
  const pdf: Record<PdfBackendName, () => TextExtractionBackend> = {
    'pdf-parse': () => new PdfExtractor(),
    unpdf: () => new UnpdfExtractor(),
  };
  return [...pdfBackends.map((name) => pdf[name]()), new DocxExtractor()];
}

/**
 * Resolve the document format from a path, or null when the extension is unsupported
 */
export function formatForPath(filePath: string): DocumentFormat | null {
  const extension = path.extname(filePath).toLowerCase();
  return FORMAT_BY_EXTENSION[extension] ?? null;
}

export class TextExtractor {
  private readonly backends: ReadonlyMap<DocumentFormat, TextExtractionBackend>;
  private readonly readDocument: (filePath: string) => Promise<Buffer>;

  /**
   * @param backends - Already-selected backends; the first one per format wins
   */
  constructor(backends: readonly TextExtractionBackend[], options: Pick<TextExtractorOptions, 'readFile'> = {}) {
    const selected = new Map<DocumentFormat, TextExtractionBackend>();
    for (const backend of backends) {
      if (!selected.has(backend.format)) {
        selected.set(backend.format, backend);
      }
    }
    this.backends = selected;
    this.readDocument = options.readFile || ((filePath) => readFile(filePath));
  }

  /**
   * Check candidates once and build an extractor from the available ones
   */
  static async create(options: TextExtractorOptions = {}): Promise<TextExtractor> {
    const candidates = options.candidates || defaultBackendCandidates();
    const availability = await Promise.all(candidates.map((backend) => backend.isAvailable()));
    const available = candidates.filter((_, index) => availability[index]);

    getLogger().info(
      {
        available: available.map((backend) => backend.name),
        unavailable: candidates.filter((_, index) => !availability[index]).map((backend) => backend.name),
      },
      'Text extraction backends selected'
    );

    return new TextExtractor(available, { readFile: options.readFile });
  }

  /**
   * Name of the backend serving `format`, if any
   */
  backendFor(format: DocumentFormat): string | null {
    return this.backends.get(format)?.name ?? null;
  }

  /**
   * Extract text from a document based on its extension
   *
   * @throws LegalDocumentError (EXTRACTION_ERROR) for unsupported extensions,
   *   missing backends and unreadable or corrupt files
   */
  async extractText(filePath: string): Promise<string> {
    const format = formatForPath(filePath);
    if (!format) {
      const extension = path.extname(filePath).toLowerCase();
      throw LegalDocumentError.extraction(`Unsupported file format: ${extension}`, filePath, { extension });
    }

    const backend = this.backends.get(format);
    if (!backend) {
      throw LegalDocumentError.extraction(
        `Required ${FORMAT_LABEL[format]} processing library not installed`,
        filePath,
        { format }
      );
    }

    const log = createChildLogger({ backend: backend.name });
    try {
      const buffer = await this.readDocument(filePath);
      const text = await backend.extract(buffer);
      log.debug({ textLength: text.length }, 'Text extracted');
      return text;
    } catch (error) {
      log.error({ error }, 'Text extraction failed');
      const reason = error instanceof Error ? error.message : String(error);
      throw LegalDocumentError.extraction(
        `Failed to extract text from ${FORMAT_LABEL[format]}: ${reason}`,
        filePath,
        { format, backend: backend.name }
      );
    }
  }
}
