import { afterEach, describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { createLogger } from '@/utils/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('writes plain JSON logs to stderr', () => {
    const destination = vi.spyOn(pino, 'destination');

    const log = createLogger({ logLevel: 'warn', nodeEnv: 'production' });

    expect(destination).toHaveBeenCalledWith(2);
    expect(log.level).toBe('warn');
  });

  it('honours the silent level', () => {
    expect(createLogger({ logLevel: 'silent', nodeEnv: 'test' }).level).toBe('silent');
  });
});
