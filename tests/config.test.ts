import { afterEach, describe, it, expect } from 'vitest';
import { buildConfig, parseConfigFileContent } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { createTree, removeTree } from './helpers.js';

describe('parseConfigFileContent', () => {
  it('should treat an empty file as no settings', () => {
    expect(parseConfigFileContent('')).toEqual({});
  });

  it('should read the known settings', () => {
    expect(parseConfigFileContent('format: json\nexcludeDirs:\n  - vendor\n')).toEqual({
      format: 'json',
      excludeDirs: ['vendor'],
    });
  });

  it('should reject an unknown format with the field name', () => {
    try {
      parseConfigFileContent('format: xml');
      expect.unreachable('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.configField : undefined).toBe('format');
    }
  });

  it('should reject unknown keys and invalid YAML', () => {
    expect(() => parseConfigFileContent('severity: high')).toThrow(ConfigurationError);
    expect(() => parseConfigFileContent('format: [json')).toThrow(ConfigurationError);
  });
});

describe('buildConfig', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) removeTree(root);
    root = undefined;
  });

  it('should fall back to defaults', () => {
    root = createTree({});
    expect(buildConfig({ rootDir: root })).toEqual({
      rootDir: root,
      format: 'terminal',
      excludeDirs: [],
      ignorePackages: [],
      allowPackages: [],
      logLevel: undefined,
    });
  });

  it('should let overrides win over the config file', () => {
    root = createTree({ '.depscout.yml': 'format: markdown\nignorePackages: [flask]\n' });

    expect(buildConfig({ rootDir: root })).toMatchObject({ format: 'markdown', ignorePackages: ['flask'] });
    expect(buildConfig({ rootDir: root, format: 'json' }).format).toBe('json');
  });
});
