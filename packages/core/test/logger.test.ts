import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/logger.js';

describe('createLogger', () => {
  it('defaults to info level json lines named alertline', () => {
    const logger = createLogger();

    expect(logger.level).toBe('info');
    expect(logger.bindings()).toEqual({ name: 'alertline' });
  });

  it('honours level and name', () => {
    const logger = createLogger({ level: 'debug', name: 'alertline-cli', destination: 2 });

    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(logger.bindings()).toEqual({ name: 'alertline-cli' });
  });
});

describe('silentLogger', () => {
  it('logs nothing', () => {
    const logger = silentLogger();

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('fatal')).toBe(false);
  });
});
