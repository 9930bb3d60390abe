import { describe, it, expect, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('tags messages when enabled', () => {
    const sink = vi.fn();
    createLogger(true, sink)('[render] hello');
    expect(sink).toHaveBeenCalledWith('[crabfetch] [render] hello');
  });

  it('stays silent when disabled', () => {
    const sink = vi.fn();
    createLogger(false, sink)('hello');
    expect(sink).not.toHaveBeenCalled();
  });
});
