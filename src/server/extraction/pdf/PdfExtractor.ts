/**
 * PdfExtractor - Extract text from PDF documents with pdf-parse
 *
 * Primary PDF backend. Text is collected page by page through pdf-parse's
 * page renderer hook so page order is preserved and pages are joined with
 * newlines.
 */

import { getLogger } from '../../utils/logger.js';
import { memoizeLoader } from '../types.js';
import type { DocumentFormat, TextExtractionBackend } from '../types.js';

/**
 * The slice of the PDF.js page proxy that pdf-parse hands to `pagerender`
 */
export interface PdfPageData {
  getTextContent(options?: {
    normalizeWhitespace?: boolean;
    disableCombineTextItems?: boolean;
  }): Promise<{ items: Array<{ str?: string; transform?: number[] }> }>;
}

export interface PdfParseOptions {
  max?: number;
  pagerender?: (pageData: PdfPageData) => Promise<string>;
}

export type PdfParseFunction = (
  buffer: Buffer,
  options?: PdfParseOptions
) => Promise<{ numpages: number; text: string }>;

function loadPdfParse(): PdfParseFunction {
  // Loaded through require: pdf-parse runs a debug self-test when it has no parent module
  const pdfParse: PdfParseFunction = require('pdf-parse');
  return pdfParse;
}

/**
 * Render one page the way pdf-parse does by default: a newline whenever the
 * baseline (transform[5]) changes between text items.
 */
export async function renderPageText(pageData: PdfPageData): Promise<string> {
  const textContent = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let lastY: number | undefined;
  let text = '';
  for (const item of textContent.items) {
    const y = item.transform?.[5];
    if (lastY === undefined || y === lastY) {
      text += item.str ?? '';
    } else {
      text += '\n' + (item.str ?? '');
    }
    lastY = y;
  }
  return text;
}

/**
 * PdfExtractor - pdf-parse backend
 */
export class PdfExtractor implements TextExtractionBackend {
  readonly name = 'pdf-parse';
  readonly format: DocumentFormat = 'pdf';
  private readonly load: () => Promise<PdfParseFunction>;

  constructor(config: { loader?: () => PdfParseFunction | Promise<PdfParseFunction> } = {}) {
    this.load = memoizeLoader(config.loader || loadPdfParse);
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.load();
      return true;
    } catch (error) {
      getLogger().warn({ error, backend: this.name }, 'PDF backend unavailable');
      return false;
    }
  }

  /**
   * Extract text from PDF buffer
   *
   * @returns Page texts joined with newlines, trimmed
   * @throws Error if the document cannot be parsed
   */
  async extract(pdfBuffer: Buffer): Promise<string> {
    const pdfParse = await this.load();
    const pages: string[] = [];

    const data = await pdfParse(pdfBuffer, {
      max: 0, // 0 = no limit on pages
      pagerender: async (pageData) => {
        const pageText = await renderPageText(pageData);
        pages.push(pageText);
        return pageText;
      },
    });

    const fullText = pages.join('\n').trim();

    getLogger().debug(
      {
        backend: this.name,
        pageCount: data.numpages,
        textLength: fullText.length,
      },
      'PDF extraction completed'
    );

    return fullText;
  }
}
