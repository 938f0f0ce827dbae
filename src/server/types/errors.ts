/**
 * Centralized error type definitions for the document processor
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Document processing
  EXTRACTION_ERROR = 'EXTRACTION_ERROR',
  EMPTY_TEXT = 'EMPTY_TEXT',
  PROCESSING_ERROR = 'PROCESSING_ERROR',

  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export type LegalDocumentErrorCode =
  | ErrorCode.EXTRACTION_ERROR
  | ErrorCode.EMPTY_TEXT
  | ErrorCode.PROCESSING_ERROR
  | ErrorCode.VALIDATION_ERROR;

const STATUS_BY_CODE: Record<LegalDocumentErrorCode, number> = {
  [ErrorCode.EXTRACTION_ERROR]: 422,
  [ErrorCode.EMPTY_TEXT]: 422,
  [ErrorCode.PROCESSING_ERROR]: 500,
  [ErrorCode.VALIDATION_ERROR]: 400,
};

export interface LegalDocumentErrorOptions {
  documentPath: string;
  field?: string;
  details?: Record<string, unknown>;
}

/**
 * The single error kind raised by the document pipeline.
 * Callers branch on `code`; `documentPath` is always set.
 */
export class LegalDocumentError extends AppError {
  public readonly code: LegalDocumentErrorCode;
  public readonly field?: string;
  public readonly documentPath: string;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: LegalDocumentErrorCode, options: LegalDocumentErrorOptions) {
    const details = { documentPath: options.documentPath, ...options.details };
    super(message, code, STATUS_BY_CODE[code], code !== ErrorCode.PROCESSING_ERROR, {
      field: options.field,
      ...details,
    });
    this.code = code;
    this.field = options.field;
    this.documentPath = options.documentPath;
    this.details = details;
  }

  static extraction(
    message: string,
    documentPath: string,
    details?: Record<string, unknown>
  ): LegalDocumentError {
    return new LegalDocumentError(message, ErrorCode.EXTRACTION_ERROR, { documentPath, details });
  }

  static emptyText(documentPath: string): LegalDocumentError {
    return new LegalDocumentError('No text extracted from document', ErrorCode.EMPTY_TEXT, {
      documentPath,
    });
  }

  static unexpected(error: unknown, documentPath: string): LegalDocumentError {
    const reason = error instanceof Error ? error.message : String(error);
    return new LegalDocumentError(`Failed to process document: ${reason}`, ErrorCode.PROCESSING_ERROR, {
      documentPath,
      details: error instanceof Error ? { cause: error.name } : undefined,
    });
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  field?: string;
  context?: Record<string, unknown>;
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isLegalDocumentError(error: unknown): error is LegalDocumentError {
  return error instanceof LegalDocumentError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}

/**
 * Render any error in the standard response shape for the caller's error layer
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  const appError = toAppError(error);
  const response: ErrorResponse = {
    error: appError.name,
    code: appError.code,
    message: appError.message,
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    context: appError.context,
  };

  if (isLegalDocumentError(appError)) {
    response.path = appError.documentPath;
    response.field = appError.field;
  }

  return response;
}
