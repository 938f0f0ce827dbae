/**
 * Environment Variable Validation
 *
 * Centralized parsing of the environment variables the document processor reads.
 * Every value has a default; invalid values are collected and reported together.
 */

// Load dotenv early so the values are present before validateEnv() runs
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

export const PDF_BACKEND_NAMES = ['pdf-parse', 'unpdf'] as const;
export type PdfBackendName = (typeof PDF_BACKEND_NAMES)[number];

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function isPdfBackendName(value: string): value is PdfBackendName {
  return (PDF_BACKEND_NAMES as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Extraction Configuration
  PDF_BACKENDS: PdfBackendName[]; // Preference order for PDF backends

  // Processing Configuration
  BATCH_CONCURRENCY: number; // 1 = sequential
  DOCUMENT_TIMEOUT_MS: number; // 0 = no timeout
  MAX_KEYWORDS: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If any value is invalid
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const pdfBackends: PdfBackendName[] = [];
  const rawBackends = (process.env.PDF_BACKENDS || PDF_BACKEND_NAMES.join(','))
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  for (const name of rawBackends) {
    if (!isPdfBackendName(name)) {
      errors.push(`PDF_BACKENDS: Unknown backend "${name}". Must be one of ${PDF_BACKEND_NAMES.join(', ')}.`);
    } else if (!pdfBackends.includes(name)) {
      pdfBackends.push(name);
    }
  }
  if (rawBackends.length === 0) {
    errors.push('PDF_BACKENDS: At least one backend must be listed.');
  }

  const batchConcurrency = parseNumericEnv(process.env.BATCH_CONCURRENCY, 1);
  if (batchConcurrency < 1) {
    errors.push(`BATCH_CONCURRENCY: Invalid value "${process.env.BATCH_CONCURRENCY}". Must be at least 1.`);
  }
  if (batchConcurrency > 32) {
    logger.warn(`BATCH_CONCURRENCY (${batchConcurrency}) is greater than 32. PDF parsing is CPU bound; expect contention.`);
  }

  const documentTimeoutMs = parseNumericEnv(process.env.DOCUMENT_TIMEOUT_MS, 0);
  if (documentTimeoutMs < 0) {
    errors.push(`DOCUMENT_TIMEOUT_MS: Invalid value "${process.env.DOCUMENT_TIMEOUT_MS}". Must be 0 or more.`);
  }

  const maxKeywords = parseNumericEnv(process.env.MAX_KEYWORDS, 10);
  if (maxKeywords < 1) {
    errors.push(`MAX_KEYWORDS: Invalid value "${process.env.MAX_KEYWORDS}". Must be at least 1.`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    PDF_BACKENDS: pdfBackends,
    BATCH_CONCURRENCY: batchConcurrency,
    DOCUMENT_TIMEOUT_MS: documentTimeoutMs,
    MAX_KEYWORDS: maxKeywords,
  };

  return validatedEnv;
}

/**
 * Get validated environment (alias of validateEnv)
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Drop the cached environment so the next getEnv() re-reads process.env
 */
export function resetEnvCache(): void {
  validatedEnv = null;
}
