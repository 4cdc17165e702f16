import { describe, it, expect } from 'vitest';
import { ConfigError, EolintError } from '../src/errors';

describe('EolintError', () => {
  it('serializes its code and details', () => {
    const error = new ConfigError('CONFIG_INVALID', 'Invalid config', { path: '.eolintrc.json' });

    expect(error).toBeInstanceOf(EolintError);
    expect(error.name).toBe('ConfigError');
    expect(error.toJSON()).toEqual({
      name: 'ConfigError',
      code: 'CONFIG_INVALID',
      message: 'Invalid config',
      details: { path: '.eolintrc.json' },
    });
  });
});
