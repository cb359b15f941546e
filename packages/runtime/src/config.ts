// Runtime configuration
//
// Read from environment variables with defaults. Library callers may skip
// this entirely and pass a registry and logger to the manager directly.

import { z } from 'zod';
import type * as Y from 'yjs';
import { createYjsDocument, type YjsDocument } from '@docmap/documents';
import { ConfigError } from './errors.js';
import { createLevelLogger, consoleLogger, type Logger } from './logger.js';

const configSchema = z.object({
  DOCMAP_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  DOCMAP_YJS_ROOT: z.string().min(1).default('root'),
});

export type DocmapConfig = {
  /** Minimum level forwarded to the console */
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';

  /** Name of the shared Y.Map holding the mapped tree */
  yjsRootName: string;
};

/**
 * Load configuration from the environment.
 *
 * @throws ConfigError if a variable is set to an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DocmapConfig {
  const parsed = configSchema.safeParse({
    DOCMAP_LOG_LEVEL: env.DOCMAP_LOG_LEVEL || undefined,
    DOCMAP_YJS_ROOT: env.DOCMAP_YJS_ROOT || undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(String(issue.path[0]), issue.message);
  }

  return {
    logLevel: parsed.data.DOCMAP_LOG_LEVEL,
    yjsRootName: parsed.data.DOCMAP_YJS_ROOT,
  };
}

export function createLoggerFromConfig(config: DocmapConfig, sink: Logger = consoleLogger): Logger {
  return createLevelLogger(config.logLevel, sink);
}

/**
 * Document over `doc` rooted at the configured shared map.
 */
export function createYjsDocumentFromConfig(config: DocmapConfig, doc?: Y.Doc): YjsDocument {
  return createYjsDocument(doc, { rootName: config.yjsRootName });
}
