import { describe, it, expect } from 'vitest';
import { ConnectionLimiter } from '../../../src/interfaces/ws/connection-limiter.js';

describe('ConnectionLimiter', () => {
  it('admits connections up to the per-address limit', () => {
    const limiter = new ConnectionLimiter(2);

    expect(limiter.tryConnect('10.0.0.1')).toBe(true);
    expect(limiter.tryConnect('10.0.0.1')).toBe(true);
    expect(limiter.tryConnect('10.0.0.1')).toBe(false);
    expect(limiter.count('10.0.0.1')).toBe(2);
  });

  it('counts each address separately', () => {
    const limiter = new ConnectionLimiter(1);

    expect(limiter.tryConnect('10.0.0.1')).toBe(true);
    expect(limiter.tryConnect('10.0.0.2')).toBe(true);
    expect(limiter.trackedAddresses).toBe(2);
  });

  it('releases slots and forgets idle addresses', () => {
    const limiter = new ConnectionLimiter(1);
    limiter.tryConnect('10.0.0.1');

    limiter.disconnect('10.0.0.1');

    expect(limiter.count('10.0.0.1')).toBe(0);
    expect(limiter.trackedAddresses).toBe(0);
    expect(limiter.tryConnect('10.0.0.1')).toBe(true);
  });

  it('ignores a disconnect for an unknown address', () => {
    const limiter = new ConnectionLimiter(1);

    limiter.disconnect('10.0.0.9');

    expect(limiter.trackedAddresses).toBe(0);
  });
});
