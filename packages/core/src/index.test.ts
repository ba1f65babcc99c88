import { describe, it, expect } from 'vitest';
import { name, createGuardSession, createPreToolUseHook, ConfigLoader } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@shellgate/core');
  });

  it('exports the session and hook entry points', () => {
    expect(typeof createGuardSession).toBe('function');
    expect(typeof createPreToolUseHook).toBe('function');
    expect(typeof ConfigLoader.load).toBe('function');
  });
});
