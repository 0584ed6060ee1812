import { describe, expect, it } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  it('tags the child with its context', () => {
    const log = createLogger('refresh');
    expect(log.bindings()).toMatchObject({ context: 'refresh' });
  });

  it('follows LOG_LEVEL', () => {
    expect(createLogger('test').level).toBe('silent');
  });
});
