import { describe, it, expect } from 'vitest';
import { createLogger, createSilentLogger } from '../src/logger.js';

describe('createLogger', () => {
  it('writes at the configured level under the server name', () => {
    const logger = createLogger({ level: 'debug' });
    expect(logger.level).toBe('debug');
    expect(logger.bindings()).toMatchObject({ name: 'investor-analysis-mcp' });
  });

  it('defaults to info', () => {
    expect(createLogger().level).toBe('info');
  });

  it('builds a silent logger for tests', () => {
    expect(createSilentLogger().level).toBe('silent');
  });
});
