import { describe, it, expect } from 'vitest';
import { ParsingError } from '../../src/errors.js';
import {
  parseCondaEnvironment,
  parseCondaSpec,
  parsePipfile,
  parsePyprojectToml,
  parseSetupCfg,
  parseSetupPy,
} from '../../src/parser/python-manifest-parser.js';
import type { Package } from '../../src/types.js';
import { sourceFile } from '../helpers.js';

function summary(packages: readonly Package[]): Array<[string, string, number | undefined]> {
  return packages.map(pkg => [pkg.name, pkg.version, pkg.sourceLocations[0]?.lineNumber]);
}

describe('parsePyprojectToml', () => {
  it('should read PEP 621 dependencies, build requirements and optional groups', () => {
    const file = sourceFile(
      'pyproject.toml',
      '[project]',
      'name = "shop-api"',
      'dependencies = [',
      '    "requests>=2.28",',
      '    "click==8.1.3",',
      ']',
      '',
      '[project.optional-dependencies]',
      'security = ["cryptography>=41.0"]',
      '',
      '[build-system]',
      'requires = ["setuptools>=61", "wheel"]',
    );
    const packages = parsePyprojectToml(file);

    expect(summary(packages)).toEqual([
      ['requests', '>=2.28', 4],
      ['click', '==8.1.3', 5],
      ['setuptools', '>=61', 12],
      ['wheel', 'latest', 12],
      ['cryptography', '>=41.0', 9],
    ]);
    expect(packages[0]?.sourceLocations[0]).toMatchObject({
      declaration: 'project.dependencies: requests>=2.28',
      fileType: 'pyproject-toml',
    });
  });

  it('should read Poetry tables and groups', () => {
    const file = sourceFile(
      'pyproject.toml',
      '[tool.poetry]',
      'name = "shop-api"',
      '',
      '[tool.poetry.dependencies]',
      'python = "^3.9"',
      'fastapi = "^0.95.0"',
      'uvicorn = { version = "^0.21.1", extras = ["standard"] }',
      'boto3 = { version = "^1.26", optional = true }',
      '',
      '[tool.poetry.group.docs.dependencies]',
      'mkdocs = "^1.4"',
    );
    const packages = parsePyprojectToml(file);

    expect(summary(packages)).toEqual([
      ['fastapi', '^0.95.0', 6],
      ['uvicorn', '^0.21.1', 7],
      ['mkdocs', '^1.4', 11],
    ]);
    expect(packages[1]?.extras).toEqual(['standard']);
    expect(packages[1]?.sourceLocations[0]?.declaration).toBe(
      'tool.poetry.dependencies.uvicorn: { version = "^0.21.1", extras = ["standard"] }',
    );
  });

  it('should raise a ParsingError for invalid TOML', () => {
    expect(() => parsePyprojectToml(sourceFile('pyproject.toml', '[project', 'x ='))).toThrow(ParsingError);
  });
});

describe('parsePipfile', () => {
  it('should read packages and dev-packages through the policy', () => {
    const file = sourceFile(
      'Pipfile',
      '[[source]]',
      'url = "https://pypi.org/simple"',
      '',
      '[packages]',
      'requests = "==2.31.0"',
      'flask = "*"',
      '',
      '[dev-packages]',
      'pytest = "*"',
    );

    expect(summary(parsePipfile(file))).toEqual([
      ['requests', '==2.31.0', 5],
      ['flask', '*', 6],
    ]);
  });
});

describe('parseSetupPy', () => {
  it('should read string literals from install_requires and skip setup_requires', () => {
    const file = sourceFile(
      'setup.py',
      'from setuptools import setup',
      '',
      'setup(',
      '    name="shop",',
      '    install_requires=[',
      '        "requests>=2.0",  # http',
      "        'click',",
      '    ],',
      '    setup_requires=["setuptools_scm"],',
      ')',
    );
    const packages = parseSetupPy(file);

    expect(summary(packages)).toEqual([
      ['requests', '>=2.0', 6],
      ['click', 'latest', 7],
    ]);
    expect(packages[0]?.sourceLocations[0]?.declaration).toBe('"requests>=2.0",  # http');
  });

  it('should ignore requirements that are commented out', () => {
    const file = sourceFile(
      'setup.py',
      'setup(',
      '    install_requires=[',
      '        "requests>=2.0",',
      '        # "oldlib==1.0",',
      '        "flask==2.3.2",  # "werkzeug<3"',
      '    ],',
      ')',
    );

    expect(summary(parseSetupPy(file))).toEqual([
      ['requests', '>=2.0', 3],
      ['flask', '==2.3.2', 5],
    ]);
  });

  it('should raise a ParsingError for an unterminated list', () => {
    const file = sourceFile('setup.py', 'setup(', '    install_requires=["requests",');
    expect(() => parseSetupPy(file)).toThrow(ParsingError);
  });
});

describe('parseSetupCfg', () => {
  it('should read indented install_requires lines under [options]', () => {
    const file = sourceFile(
      'setup.cfg',
      '[metadata]',
      'name = shop',
      '',
      '[options]',
      'install_requires =',
      '    requests>=2.0',
      '    pyyaml==6.0',
      '',
      '[options.extras_require]',
      'dev = pytest',
    );

    expect(summary(parseSetupCfg(file))).toEqual([
      ['requests', '>=2.0', 6],
      ['pyyaml', '==6.0', 7],
    ]);
  });
});

describe('parseCondaEnvironment', () => {
  it('should read conda specs and the nested pip list', () => {
    const file = sourceFile(
      'environment.yml',
      'name: shop-env',
      'channels:',
      '  - conda-forge',
      'dependencies:',
      '  - python=3.10',
      '  - numpy=1.24.3=py310h',
      '  - conda-forge::pandas>=2.0',
      '  - pip',
      '  - pip:',
      '      - requests==2.31.0',
    );
    const packages = parseCondaEnvironment(file);

    expect(packages.map(pkg => [pkg.name, pkg.version, pkg.ecosystem, pkg.sourceLocations[0]?.lineNumber])).toEqual([
      ['python', '3.10', 'conda', 5],
      ['numpy', '1.24.3', 'conda', 6],
      ['pandas', '>=2.0', 'conda', 7],
      ['pip', 'latest', 'conda', 8],
      ['requests', '==2.31.0', 'pypi', 10],
    ]);
    expect(packages[4]?.sourceLocations[0]?.declaration).toBe('dependencies.pip: requests==2.31.0');
  });
});

describe('parseCondaSpec', () => {
  it('should handle the conda match-spec shapes', () => {
    expect(parseCondaSpec('scipy')).toEqual({ name: 'scipy', version: 'latest' });
    expect(parseCondaSpec('scipy==1.11.1')).toEqual({ name: 'scipy', version: '==1.11.1' });
    expect(parseCondaSpec('scipy 1.11 py311_0')).toEqual({ name: 'scipy', version: '1.11' });
    expect(parseCondaSpec('scipy>=1.10,<2')).toEqual({ name: 'scipy', version: '>=1.10' });
  });
});
