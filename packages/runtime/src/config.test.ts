// Tests for configuration loading

import { describe, it, expect } from 'vitest';
import * as Y from 'yjs';
import { createLoggerFromConfig, createYjsDocumentFromConfig, loadConfig } from './config.js';
import { createCapturingLogger } from './logger.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', yjsRootName: 'root' });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ DOCMAP_LOG_LEVEL: '', DOCMAP_YJS_ROOT: '' })).toEqual({
      logLevel: 'warn',
      yjsRootName: 'root',
    });
  });

  it('reads both variables', () => {
    expect(loadConfig({ DOCMAP_LOG_LEVEL: 'debug', DOCMAP_YJS_ROOT: 'crm' })).toEqual({
      logLevel: 'debug',
      yjsRootName: 'crm',
    });
  });

  it('rejects unknown log levels', () => {
    try {
      loadConfig({ DOCMAP_LOG_LEVEL: 'verbose' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).variable).toBe('DOCMAP_LOG_LEVEL');
      expect((error as ConfigError).code).toBe('CONFIG_ERROR');
    }
  });
});

describe('createLoggerFromConfig', () => {
  it('filters by the configured level', () => {
    const sink = createCapturingLogger();
    const logger = createLoggerFromConfig({ logLevel: 'info', yjsRootName: 'root' }, sink);

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.entries.map((e) => e.message)).toEqual(['shown']);
  });
});

describe('createYjsDocumentFromConfig', () => {
  it('writes under the configured root map', () => {
    const ydoc = new Y.Doc();
    const doc = createYjsDocumentFromConfig(loadConfig({ DOCMAP_YJS_ROOT: 'crm' }), ydoc);

    doc.put(['contacts'], {});

    expect(ydoc.getMap('crm').has('contacts')).toBe(true);
    expect(ydoc.getMap('root').size).toBe(0);
  });
});
