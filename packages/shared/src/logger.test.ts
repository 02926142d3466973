import { describe, it, expect } from 'vitest';
import { createChildLogger, resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('should honour a valid LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug', VITEST: 'true' })).toBe('debug');
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
  });

  it('should stay silent under the test runner unless asked otherwise', () => {
    expect(resolveLogLevel({ VITEST: 'true' })).toBe('silent');
  });
});

describe('createChildLogger', () => {
  it('should tag records with the component name', () => {
    const log = createChildLogger('gateway:resource');

    expect(log.bindings()['component']).toBe('gateway:resource');
  });
});
