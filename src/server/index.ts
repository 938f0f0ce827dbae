export { DocumentProcessor } from './services/legal/DocumentProcessor.js';
export type {
  BatchOptions,
  DocumentProcessorDefaults,
  DocumentProcessorDependencies,
  ProcessTextOptions,
} from './services/legal/DocumentProcessor.js';
export { ArticleExtractor } from './services/legal/ArticleExtractor.js';
export type { ArticleExtractorDependencies } from './services/legal/ArticleExtractor.js';
export { KeywordExtractor } from './services/legal/KeywordExtractor.js';
export { ReferenceExtractor } from './services/legal/ReferenceExtractor.js';
export {
  DEFAULT_JURISDICTION,
  DEFAULT_LAW_NAME,
  LawSourceDetector,
  defaultLawSource,
} from './services/legal/LawSourceDetector.js';
export { ARABIC_ORDINALS, ordinalToNumeral } from './services/legal/arabicOrdinals.js';

export { TextExtractor, defaultBackendCandidates, formatForPath } from './extraction/TextExtractor.js';
export type { TextExtractorOptions } from './extraction/TextExtractor.js';
export type { DocumentFormat, TextExtractionBackend } from './extraction/types.js';
export { PdfExtractor } from './extraction/pdf/PdfExtractor.js';
export { UnpdfExtractor } from './extraction/pdf/UnpdfExtractor.js';
export { DocxExtractor } from './extraction/docx/DocxExtractor.js';

export {
  AppError,
  ErrorCode,
  LegalDocumentError,
  isAppError,
  isLegalDocumentError,
  toAppError,
  toErrorResponse,
} from './types/errors.js';
export type { ErrorResponse, LegalDocumentErrorCode } from './types/errors.js';
export { LAW_TYPES } from './types/legal.js';
export type {
  Article,
  BatchEntry,
  BatchResult,
  LawSourceMetadata,
  LawSourceOverrides,
  LawType,
  ProcessingResult,
  ProcessingStatistics,
} from './types/legal.js';

export { lawSourceOverridesSchema, validateLawSourceOverrides } from './validation/lawSourceSchemas.js';
export { defaultArabicTextUtility, normalizeArabicText } from './utils/arabicText.js';
export type { ArabicTextUtility } from './utils/arabicText.js';
export { getEnv, resetEnvCache } from './config/env.js';
export type { Env } from './config/env.js';
export { logger } from './utils/logger.js';
