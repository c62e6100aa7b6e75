import { describe, it, expect } from 'vitest';
import { parsePoetryLock, parseUvLock } from '../../src/parser/python-lockfile-parser.js';
import { sourceFile } from '../helpers.js';

describe('parsePoetryLock', () => {
  it('should report every locked package with its resolved version', () => {
    const file = sourceFile(
      'poetry.lock',
      '[[package]]',
      'name = "certifi"',
      'version = "2023.7.22"',
      'description = "Root certificates"',
      '',
      '[[package]]',
      'name = "requests"',
      'version = "2.31.0"',
    );
    const packages = parsePoetryLock(file);

    expect(packages.map(pkg => [pkg.name, pkg.version, pkg.ecosystem])).toEqual([
      ['certifi', '2023.7.22', 'pypi'],
      ['requests', '2.31.0', 'pypi'],
    ]);
    expect(packages[1]?.sourceLocations).toEqual([
      { filePath: '/project/poetry.lock', lineNumber: 7, declaration: 'requests = "2.31.0"', fileType: 'poetry-lock' },
    ]);
  });
});

describe('parseUvLock', () => {
  it('should skip the project being locked', () => {
    const file = sourceFile(
      'uv.lock',
      'version = 1',
      '',
      '[[package]]',
      'name = "shop-api"',
      'version = "0.1.0"',
      'source = { editable = "." }',
      '',
      '[[package]]',
      'name = "anyio"',
      'version = "4.0.0"',
      'source = { registry = "https://pypi.org/simple" }',
    );
    const packages = parseUvLock(file);

    expect(packages).toHaveLength(1);
    expect(packages[0]).toMatchObject({ name: 'anyio', version: '4.0.0' });
    expect(packages[0]?.sourceLocations[0]).toMatchObject({ lineNumber: 9, fileType: 'uv-lock' });
  });
});
