import { describe, it, expect } from 'vitest';
import { createLogger } from '../../src/infrastructure/logger.js';

describe('createLogger', () => {
  it('uses the configured level', () => {
    const log = createLogger({ level: 'warn' });

    expect(log.level).toBe('warn');
    expect(log.isLevelEnabled('info')).toBe(false);
    expect(log.isLevelEnabled('error')).toBe(true);
  });

  it('tags every line with the service name', () => {
    expect(createLogger({ level: 'info', service: 'bridge-test' }).bindings()).toEqual({ service: 'bridge-test' });
  });
});
