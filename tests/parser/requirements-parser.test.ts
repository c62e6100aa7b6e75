import { afterEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { parseRequirementSpec, parseRequirementsFile } from '../../src/parser/requirements-parser.js';
import { readSourceFile } from '../../src/parser/source-file.js';
import { createTree, removeTree, sourceFile } from '../helpers.js';

describe('parseRequirementSpec', () => {
  it('should keep the operator and first constraint', () => {
    expect(parseRequirementSpec('django>=3.2.0,<4.0.0')).toMatchObject({ name: 'django', version: '>=3.2.0' });
  });

  it('should default to latest without a constraint', () => {
    expect(parseRequirementSpec('flask')).toMatchObject({ name: 'flask', version: 'latest' });
  });

  it('should split extras and environment markers into their own fields', () => {
    expect(parseRequirementSpec('requests[security,socks]>=2.0 ; python_version >= "3.6"')).toEqual({
      name: 'requests',
      version: '>=2.0',
      extras: ['security', 'socks'],
      environmentMarker: 'python_version >= "3.6"',
      editable: false,
      url: undefined,
    });
  });

  it('should read an editable VCS install', () => {
    expect(parseRequirementSpec('-e git+https://github.com/user/repo.git#egg=mypackage')).toEqual({
      name: 'mypackage',
      version: 'latest',
      extras: [],
      environmentMarker: undefined,
      editable: true,
      url: 'git+https://github.com/user/repo.git',
    });
  });

  it('should read a direct reference', () => {
    expect(parseRequirementSpec('mylib @ https://files.internal/mylib-1.0.tar.gz')).toMatchObject({
      name: 'mylib',
      version: 'latest',
      url: 'https://files.internal/mylib-1.0.tar.gz',
    });
  });

  it('should accept the legacy parenthesized form', () => {
    expect(parseRequirementSpec('six (>=1.16)')).toMatchObject({ name: 'six', version: '>=1.16' });
  });

  it('should ignore comments, options and invalid names', () => {
    expect(parseRequirementSpec('# pinned for CVE fixes')).toBeUndefined();
    expect(parseRequirementSpec('--index-url https://pypi.internal/simple')).toBeUndefined();
    expect(parseRequirementSpec('./local/path')).toBeUndefined();
  });
});

describe('parseRequirementsFile', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) removeTree(root);
    root = undefined;
  });

  it('should report pinned and ranged requirements and drop test tooling', () => {
    const file = sourceFile('requirements.txt', 'requests==2.25.1', 'django>=3.2.0,<4.0.0', 'pytest==6.2.4');
    const packages = parseRequirementsFile(file);

    expect(packages).toHaveLength(2);
    expect(packages[0]).toMatchObject({ name: 'requests', version: '==2.25.1', ecosystem: 'pypi' });
    expect(packages[0]?.sourceLocations).toEqual([
      { filePath: '/project/requirements.txt', lineNumber: 1, declaration: 'requests==2.25.1', fileType: 'requirements' },
    ]);
    expect(packages[1]).toMatchObject({ name: 'django', version: '>=3.2.0' });
    expect(packages[1]?.sourceLocations[0]?.lineNumber).toBe(2);
  });

  it('should keep the raw line, comment included, as the declaration', () => {
    const file = sourceFile('requirements.txt', '', 'Flask==2.0.1  # web framework');
    const [flask] = parseRequirementsFile(file);

    expect(flask?.name).toBe('flask');
    expect(flask?.sourceLocations[0]).toMatchObject({ lineNumber: 2, declaration: 'Flask==2.0.1  # web framework' });
  });

  it('should join continuation lines and strip hashes', () => {
    const file = sourceFile('requirements.txt', 'numpy==1.21.0 \\', '    --hash=sha256:0a1b2c', 'scipy==1.7.0');
    const packages = parseRequirementsFile(file);

    expect(packages.map(pkg => [pkg.name, pkg.version, pkg.sourceLocations[0]?.lineNumber])).toEqual([
      ['numpy', '==1.21.0', 1],
      ['scipy', '==1.7.0', 3],
    ]);
  });

  it('should follow -r includes relative to the file', () => {
    root = createTree({
      'requirements.txt': '-r base.txt\nflask==2.0.1\n',
      'base.txt': 'requests==2.25.1\n',
    });
    const packages = parseRequirementsFile(readSourceFile(join(root, 'requirements.txt')));

    expect(packages.map(pkg => pkg.name)).toEqual(['requests', 'flask']);
    expect(packages[0]?.sourceLocations[0]).toMatchObject({ filePath: join(root, 'base.txt'), lineNumber: 1 });
  });

  it('should skip a missing include', () => {
    root = createTree({ 'requirements.txt': '-r missing.txt\nflask==2.0.1\n' });
    const packages = parseRequirementsFile(readSourceFile(join(root, 'requirements.txt')));

    expect(packages.map(pkg => pkg.name)).toEqual(['flask']);
  });

  it('should stop at a cyclic include', () => {
    root = createTree({
      'a.txt': '-r b.txt\nflask==2.0.1\n',
      'b.txt': '-r a.txt\nrequests==2.25.1\n',
    });
    const packages = parseRequirementsFile(readSourceFile(join(root, 'a.txt')));

    expect(packages.map(pkg => pkg.name)).toEqual(['requests', 'flask']);
  });

  it('should produce identical output when parsed twice', () => {
    const file = sourceFile('requirements.txt', 'requests==2.25.1', 'click>=8');
    expect(parseRequirementsFile(file)).toEqual(parseRequirementsFile(file));
  });
});
