/**
 * Records produced by the Arabic legal document pipeline
 */

export const LAW_TYPES = ['law', 'decree', 'regulation', 'directive'] as const;
export type LawType = (typeof LAW_TYPES)[number];

/**
 * Metadata describing the legal instrument a document represents
 */
export interface LawSourceMetadata {
  name: string;
  type: LawType;
  jurisdiction: string;
  issuingAuthority: string | null;
  /** ISO date; synthesized as January 1st when only a year is found */
  issueDate: string | null;
  lastUpdate: string | null;
  description: string | null;
  sourceUrl: string | null;
}

/**
 * Caller-supplied metadata; any non-null field overrides detection
 */
export type LawSourceOverrides = {
  [K in keyof LawSourceMetadata]?: LawSourceMetadata[K] | null;
};

export interface Article {
  /** Canonical form "المادة {N}" */
  articleNumber: string;
  title: string | null;
  content: string;
  keywords: string[];
  relatedReferences: string[];
}

export interface ProcessingStatistics {
  totalArticles: number;
  totalCharacters: number;
  /** ISO timestamp of completion */
  processingTime: string;
  filePath: string;
}

export interface ProcessingResult {
  lawSource: LawSourceMetadata;
  articles: Article[];
  statistics: ProcessingStatistics;
}

export type BatchEntry =
  | { filePath: string; success: true; data: ProcessingResult; error: null }
  | { filePath: string; success: false; data: null; error: string };

export interface BatchResult {
  results: BatchEntry[];
  statistics: {
    totalFiles: number;
    successful: number;
    failed: number;
  };
}
