import { describe, it, expect, vi } from 'vitest';
import { PendingCalls } from '../pending-calls.js';

describe('PendingCalls', () => {
  it('should hand out increasing ids from 0', () => {
    const calls = new PendingCalls();

    expect(calls.register(vi.fn())).toBe(0);
    expect(calls.register(vi.fn())).toBe(1);
    expect(calls.size).toBe(2);
  });

  it('should settle a call once', () => {
    const calls = new PendingCalls();
    const handler = vi.fn();
    const id = calls.register(handler);

    expect(calls.settle(id, true, '"ok"')).toBe(true);
    expect(calls.settle(id, false, 'again')).toBe(false);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(true, '"ok"');
    expect(calls.has(id)).toBe(false);
    expect(calls.size).toBe(0);
  });

  it('should ignore unknown ids', () => {
    expect(new PendingCalls().settle(42, true, 'null')).toBe(false);
  });
});
