/**
 * DocumentProcessor - Turn a legal document into a structured law record
 *
 * Pipeline per document:
 * 1. Validate caller overrides
 * 2. Extract text (PDF/DOCX)
 * 3. Detect law source metadata and merge overrides
 * 4. Segment articles with keywords and references
 * 5. Build statistics
 *
 * Batches process every path independently; a failed document becomes a
 * failed entry and never aborts the rest.
 */

import { getEnv } from '../../config/env.js';
import { TextExtractor } from '../../extraction/TextExtractor.js';
import { ErrorCode, LegalDocumentError, isLegalDocumentError } from '../../types/errors.js';
import type { BatchEntry, BatchResult, LawSourceOverrides, ProcessingResult } from '../../types/legal.js';
import { defaultArabicTextUtility } from '../../utils/arabicText.js';
import type { ArabicTextUtility } from '../../utils/arabicText.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { getLogger, runWithDocumentContext } from '../../utils/logger.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { validateLawSourceOverrides } from '../../validation/lawSourceSchemas.js';
import { ArticleExtractor } from './ArticleExtractor.js';
import { KeywordExtractor } from './KeywordExtractor.js';
import { LawSourceDetector } from './LawSourceDetector.js';
import { ReferenceExtractor } from './ReferenceExtractor.js';

/** Label used in statistics and errors when text did not come from a file */
const INLINE_SOURCE = '<text>';

export interface DocumentProcessorDefaults {
  batchConcurrency: number;
  documentTimeoutMs: number;
  maxKeywords: number;
}

export interface DocumentProcessorDependencies {
  /** An extractor, or a factory called once on first use (defaults to TextExtractor.create) */
  textExtractor?: TextExtractor | (() => Promise<TextExtractor>);
  lawSourceDetector?: LawSourceDetector;
  articleExtractor?: ArticleExtractor;
  textUtility?: ArabicTextUtility;
  /** Defaults to BATCH_CONCURRENCY, DOCUMENT_TIMEOUT_MS and MAX_KEYWORDS from the environment */
  defaults?: Partial<DocumentProcessorDefaults>;
}

export interface ProcessTextOptions {
  /** Path reported in statistics and errors */
  sourcePath?: string;
  lawSourceOverrides?: LawSourceOverrides | null;
}

export interface BatchOptions {
  /** Documents processed in parallel; 1 = sequential */
  concurrency?: number;
  /** Per-document wall-clock limit; 0 = none */
  documentTimeoutMs?: number;
}

export class DocumentProcessor {
  private readonly lawSourceDetector: LawSourceDetector;
  private readonly articleExtractor: ArticleExtractor;
  private readonly defaults: DocumentProcessorDefaults;
  private readonly createExtractor: () => Promise<TextExtractor>;
  private extractorPromise: Promise<TextExtractor> | null = null;

  constructor(dependencies: DocumentProcessorDependencies = {}) {
    this.defaults = DocumentProcessor.resolveDefaults(dependencies.defaults);

    const textUtility = dependencies.textUtility || defaultArabicTextUtility;
    this.lawSourceDetector = dependencies.lawSourceDetector || new LawSourceDetector();
    this.articleExtractor =
      dependencies.articleExtractor ||
      new ArticleExtractor({
        keywordExtractor: new KeywordExtractor(textUtility),
        referenceExtractor: new ReferenceExtractor(),
        textUtility,
        maxKeywords: this.defaults.maxKeywords,
      });

    const extractor = dependencies.textExtractor;
    if (extractor instanceof TextExtractor) {
      this.createExtractor = () => Promise.resolve(extractor);
    } else {
      this.createExtractor = extractor || (() => TextExtractor.create());
    }
  }

  private static resolveDefaults(overrides: Partial<DocumentProcessorDefaults> = {}): DocumentProcessorDefaults {
    const complete =
      overrides.batchConcurrency !== undefined &&
      overrides.documentTimeoutMs !== undefined &&
      overrides.maxKeywords !== undefined;
    const env = complete ? null : getEnv();

    return {
      batchConcurrency: overrides.batchConcurrency ?? env?.BATCH_CONCURRENCY ?? 1,
      documentTimeoutMs: overrides.documentTimeoutMs ?? env?.DOCUMENT_TIMEOUT_MS ?? 0,
      maxKeywords: overrides.maxKeywords ?? env?.MAX_KEYWORDS ?? 10,
    };
  }

  /**
   * Text extractor, created on first use and shared afterwards
   */
  private getTextExtractor(): Promise<TextExtractor> {
    if (!this.extractorPromise) {
      this.extractorPromise = this.createExtractor().catch((error: unknown) => {
        this.extractorPromise = null;
        throw error;
      });
    }
    return this.extractorPromise;
  }

  /**
   * Process a single legal document
   *
   * @throws LegalDocumentError VALIDATION_ERROR, EXTRACTION_ERROR, EMPTY_TEXT or PROCESSING_ERROR
   */
  async process(filePath: string, lawSourceOverrides?: LawSourceOverrides | null): Promise<ProcessingResult> {
    return runWithDocumentContext({ documentPath: filePath }, async () => {
      try {
        const overrides = this.validateOverrides(lawSourceOverrides, filePath);

        const extractor = await this.getTextExtractor();
        const text = await extractor.extractText(filePath);
        getLogger().debug({ textLength: text.length }, 'Text extracted from document');

        return this.analyze(text, filePath, overrides);
      } catch (error) {
        throw this.toDomainError(error, filePath);
      }
    });
  }

  /**
   * Run the pipeline on text that has already been extracted
   *
   * @throws LegalDocumentError VALIDATION_ERROR, EMPTY_TEXT or PROCESSING_ERROR
   */
  processText(text: string, options: ProcessTextOptions = {}): ProcessingResult {
    const sourcePath = options.sourcePath || INLINE_SOURCE;
    return runWithDocumentContext({ documentPath: sourcePath }, () => {
      try {
        const overrides = this.validateOverrides(options.lawSourceOverrides, sourcePath);
        return this.analyze(text, sourcePath, overrides);
      } catch (error) {
        throw this.toDomainError(error, sourcePath);
      }
    });
  }

  /**
   * Process several documents; the same overrides apply to every document
   */
  async processBatch(
    filePaths: readonly string[],
    lawSourceOverrides?: LawSourceOverrides | null,
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    const concurrency = options.concurrency ?? this.defaults.batchConcurrency;
    const documentTimeoutMs = options.documentTimeoutMs ?? this.defaults.documentTimeoutMs;

    const results = await mapWithConcurrency(filePaths, concurrency, (filePath, batchIndex) =>
      runWithDocumentContext({ documentPath: filePath, batchIndex }, async (): Promise<BatchEntry> => {
        try {
          const data = await withTimeout(
            this.process(filePath, lawSourceOverrides),
            documentTimeoutMs,
            `Processing ${filePath}`
          );
          return { filePath, success: true, data, error: null };
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          getLogger().warn({ error: message }, 'Document failed in batch');
          return { filePath, success: false, data: null, error: message };
        }
      })
    );

    const successful = results.filter((entry) => entry.success).length;
    const statistics = {
      totalFiles: filePaths.length,
      successful,
      failed: results.length - successful,
    };

    getLogger().info({ ...statistics, concurrency }, 'Batch processing completed');

    return { results, statistics };
  }

  private validateOverrides(input: unknown, documentPath: string): LawSourceOverrides {
    const validation = validateLawSourceOverrides(input);
    if (validation.success) {
      return validation.data;
    }

    const [first] = validation.issues;
    throw new LegalDocumentError(
      `Invalid law source overrides: ${validation.issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`,
      ErrorCode.VALIDATION_ERROR,
      { documentPath, field: first?.field, details: { issues: validation.issues } }
    );
  }

  private analyze(text: string, sourcePath: string, overrides: LawSourceOverrides): ProcessingResult {
    if (!text || !text.trim()) {
      throw LegalDocumentError.emptyText(sourcePath);
    }

    const detected = this.lawSourceDetector.detect(text);
    const lawSource = this.lawSourceDetector.merge(detected, overrides);
    const articles = this.articleExtractor.extract(text);

    const result: ProcessingResult = {
      lawSource,
      articles,
      statistics: {
        totalArticles: articles.length,
        totalCharacters: articles.reduce((sum, article) => sum + article.content.length, 0),
        processingTime: new Date().toISOString(),
        filePath: sourcePath,
      },
    };

    getLogger().info(
      {
        lawName: lawSource.name,
        totalArticles: result.statistics.totalArticles,
        totalCharacters: result.statistics.totalCharacters,
      },
      'Document processed'
    );

    return result;
  }

  private toDomainError(error: unknown, documentPath: string): LegalDocumentError {
    if (isLegalDocumentError(error)) {
      return error;
    }
    getLogger().error({ error }, 'Unexpected failure while processing document');
    return LegalDocumentError.unexpected(error, documentPath);
  }
}
