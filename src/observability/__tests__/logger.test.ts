import { describe, it, expect } from 'vitest';
import { createChildLogger, createLogger, loggerOptions } from '../logger.js';

describe('loggerOptions', () => {
  it('reads LOG_LEVEL in any case', () => {
    expect(loggerOptions({ LOG_LEVEL: ' WARN ' }).level).toBe('warn');
  });

  it('falls back to info for unset or unknown levels', () => {
    expect(loggerOptions({}).level).toBe('info');
    expect(loggerOptions({ LOG_LEVEL: 'loud' }).level).toBe('info');
  });

  it('accepts silent', () => {
    expect(loggerOptions({ LOG_LEVEL: 'silent' }).level).toBe('silent');
  });

  it('uses pino-pretty only for LOG_PRETTY=true', () => {
    expect(loggerOptions({ LOG_PRETTY: 'true' }).transport).toMatchObject({ target: 'pino-pretty' });
    expect(loggerOptions({ LOG_PRETTY: '1' }).transport).toBeUndefined();
  });

  it('tags every entry with the service name', () => {
    expect(loggerOptions({}).base).toEqual({ service: 'parliament-pipeline' });
  });
});

describe('createLogger', () => {
  it('binds the module name and extra context', () => {
    const log = createChildLogger(createLogger('ingest/pipeline'), { runId: 'run-1' });
    expect(log.bindings()).toMatchObject({ module: 'ingest/pipeline', runId: 'run-1' });
  });

  it('builds the root from the environment', () => {
    expect(createLogger('db/sqlite').level).toBe('silent');
  });
});
