/**
 * Shared contract for text extraction backends
 */

export type DocumentFormat = 'pdf' | 'docx';

/**
 * A library that turns a document buffer into plain text.
 *
 * Backends are checked once with isAvailable(); extract() is only called on
 * backends that reported themselves available.
 */
export interface TextExtractionBackend {
  readonly name: string;
  readonly format: DocumentFormat;
  isAvailable(): Promise<boolean>;
  extract(buffer: Buffer): Promise<string>;
}

/**
 * Lazily load a backend library once and remember the outcome
 */
export function memoizeLoader<T>(load: () => T | Promise<T>): () => Promise<T> {
  let loading: Promise<T> | null = null;
  return () => {
    if (!loading) {
      loading = Promise.resolve().then(load);
    }
    return loading;
  };
}
