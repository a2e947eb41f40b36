import { resolve } from 'node:path';
import { describe, expect, test } from 'vitest';
import { loadConfigFromArgs, parseVerbosity } from '../src/config.js';

describe('loadConfigFromArgs', () => {
  test('uses defaults without flags', () => {
    expect(loadConfigFromArgs([], '/srv/netcfg')).toEqual({
      rootDir: '/srv/netcfg',
      configsDir: 'configs',
      minimalResults: false,
      cleanBoundaries: false,
      verbosity: 4,
    });
  });

  test('parses every flag', () => {
    const config = loadConfigFromArgs(
      ['--root', 'data', '--configs', 'dumps', '--verbosity', '5', '--minimal', '--clean'],
      '/srv/netcfg'
    );

    expect(config).toEqual({
      rootDir: resolve('/srv/netcfg', 'data'),
      configsDir: 'dumps',
      minimalResults: true,
      cleanBoundaries: true,
      verbosity: 5,
    });
  });

  test('rejects a verbosity outside 1..5', () => {
    expect(() => loadConfigFromArgs(['--verbosity', '6'], '/srv/netcfg')).toThrow(
      'Invalid --verbosity: "6" (expected 1..5)'
    );
  });

  test('rejects unknown arguments', () => {
    expect(() => loadConfigFromArgs(['--bogus'], '/srv/netcfg')).toThrow('Unknown argument: --bogus');
  });

  test('rejects a flag without its value', () => {
    expect(() => loadConfigFromArgs(['--configs'], '/srv/netcfg')).toThrow('Missing value for --configs');
  });
});

describe('parseVerbosity', () => {
  test('accepts integers from 1 to 5', () => {
    expect(parseVerbosity('1')).toBe(1);
    expect(parseVerbosity('5')).toBe(5);
  });

  test('rejects fractions and text', () => {
    expect(() => parseVerbosity('2.5')).toThrow('Invalid --verbosity: "2.5" (expected 1..5)');
    expect(() => parseVerbosity('debug')).toThrow('Invalid --verbosity: "debug" (expected 1..5)');
  });
});
