import { describe, it, expect } from 'vitest';
import { createToken, TASK_TOKEN_BYTES } from '../../../src/shared/token.js';

describe('createToken', () => {
  it('encodes 32 random bytes as 43 characters by default', () => {
    expect(createToken()).toHaveLength(43);
  });

  it('scales with the requested size', () => {
    expect(createToken(TASK_TOKEN_BYTES)).toHaveLength(32);
  });

  it('only uses letters, digits and underscores', () => {
    for (let i = 0; i < 50; i++) {
      expect(createToken()).toMatch(/^[A-Za-z0-9_]+$/);
    }
  });

  it('does not repeat itself', () => {
    const tokens = new Set(Array.from({ length: 100 }, () => createToken()));
    expect(tokens.size).toBe(100);
  });
});
