import { describe, it, expect } from 'vitest';
import { resolveConfig, ConfigError, validateName, validateRefName, InvalidNameError } from '../src/index.js';

describe('resolveConfig', () => {
  it('fills defaults', () => {
    expect(resolveConfig()).toEqual({
      version: 1,
      chunkSize: 262144,
      maxLinks: 174,
      branch: 'main',
      author: 'dagfile',
      email: 'dagfile@localhost',
    });
  });

  it('keeps given values', () => {
    const config = resolveConfig({ version: 0, chunkSize: 1024, branch: 'files/v2' });
    expect(config.version).toBe(0);
    expect(config.chunkSize).toBe(1024);
    expect(config.branch).toBe('files/v2');
  });

  it('rejects a bad branch name', () => {
    expect(() => resolveConfig({ branch: 'my branch' })).toThrow(/branch: Invalid ref name 'my branch': contains space/);
  });

  it('rejects maxLinks below 2', () => {
    expect(() => resolveConfig({ maxLinks: 1 })).toThrow(/maxLinks/);
  });

  it('rejects unknown versions', () => {
    expect(() => resolveConfig(JSON.parse('{"version":2}'))).toThrow(ConfigError);
  });

  it('lists every invalid field', () => {
    expect(() => resolveConfig({ chunkSize: -1, author: '' })).toThrow(/chunkSize: .*; author: /);
  });
});

describe('validateRefName', () => {
  it('accepts valid name', () => {
    expect(() => validateRefName('main')).not.toThrow();
  });

  it('rejects colon', () => {
    expect(() => validateRefName('my:branch')).toThrow(/colon/);
  });

  it('rejects tab and newline', () => {
    expect(() => validateRefName('my\tbranch')).toThrow(/tab/);
    expect(() => validateRefName('my\nbranch')).toThrow(/newline/);
  });
});

describe('validateName', () => {
  it('returns a valid name', () => {
    expect(validateName('notes.txt')).toBe('notes.txt');
  });

  it.each(['', 'a/b', 'a\\b', '.', '..', '.node'])('rejects %j', (name) => {
    expect(() => validateName(name)).toThrow(InvalidNameError);
  });
});
