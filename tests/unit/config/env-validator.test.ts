import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { validateEnv } from '../../../src/config/env-validator.js';
import { resetConfig } from '../../../src/config/config-manager.js';
import { InvalidConfigError } from '../../../src/shared/errors.js';

describe('validateEnv', () => {
  beforeEach(() => {
    delete process.env.WEBLAB_USERNAME;
    delete process.env.WEBLAB_PASSWORD;
    resetConfig();
  });

  afterEach(() => {
    delete process.env.WEBLAB_USERNAME;
    delete process.env.WEBLAB_PASSWORD;
    resetConfig();
  });

  it('fails without scheduler credentials', () => {
    expect(() => validateEnv()).toThrow(InvalidConfigError);
    expect(() => validateEnv()).toThrow('Invalid configuration. Missing WEBLAB_USERNAME, WEBLAB_PASSWORD');
  });

  it('names only what is missing', () => {
    process.env.WEBLAB_USERNAME = 'scheduler';
    expect(() => validateEnv()).toThrow('Invalid configuration. Missing WEBLAB_PASSWORD');
  });

  it('passes with credentials', () => {
    process.env.WEBLAB_USERNAME = 'scheduler';
    process.env.WEBLAB_PASSWORD = 'test-secret';
    expect(() => validateEnv()).not.toThrow();
  });
});
