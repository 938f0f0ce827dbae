import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * Per-document logging context (document path, batch index, ...)
 */
export interface DocumentLogContext {
  documentPath?: string;
  batchIndex?: number;
  [key: string]: unknown;
}

export const documentContext = new AsyncLocalStorage<DocumentLogContext>();

/**
 * Get current document context
 */
export function getDocumentContext(): DocumentLogContext {
  return documentContext.getStore() || {};
}

export interface LoggerSettings {
  nodeEnv: string;
  level: string;
  pretty: boolean;
}

/**
 * Logging settings from the environment (NODE_ENV, LOG_LEVEL, LOG_PRETTY).
 * LOG_PRETTY=true|false wins; otherwise pretty output is on in development only.
 */
export function resolveLoggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const nodeEnv = env.NODE_ENV || 'development';

  let level = env.LOG_LEVEL;
  if (!level) {
    if (nodeEnv === 'test') {
      level = 'silent';
    } else {
      level = nodeEnv === 'production' ? 'info' : 'debug';
    }
  }

  let pretty = nodeEnv === 'development';
  if (env.LOG_PRETTY === 'true' || env.LOG_PRETTY === 'false') {
    pretty = env.LOG_PRETTY === 'true';
  }

  return { nodeEnv, level, pretty };
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const { nodeEnv, level, pretty } = resolveLoggerSettings();

  return pino({
    level,
    base: {
      env: nodeEnv,
      service: 'arabic-legal-document-processor',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Logger bound to the document currently being processed (if any)
 */
export function getLogger(): Logger {
  const context = getDocumentContext();
  return Object.keys(context).length > 0 ? logger.child(context) : logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child({ ...getDocumentContext(), ...additionalContext });
}

/**
 * Run `fn` with `context` attached to every log line emitted through getLogger()
 */
export function runWithDocumentContext<T>(context: DocumentLogContext, fn: () => T): T {
  return documentContext.run({ ...getDocumentContext(), ...context }, fn);
}
