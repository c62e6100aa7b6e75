import { describe, it, expect } from 'vitest';
import { displayPath, formatJson, formatMarkdown, formatOutput, formatTerminal, groupByEcosystem } from '../../src/reporter/index.js';
import type { ScanResult } from '../../src/types.js';

const RESULT: ScanResult = {
  rootDir: '/project',
  packages: [
    {
      name: 'lodash',
      version: '4.17.21',
      ecosystem: 'npm',
      sourceLocations: [
        { filePath: '/project/web/yarn.lock', lineNumber: 5, declaration: 'version "4.17.21"', fileType: 'yarn-lock' },
      ],
      extras: [],
      environmentMarker: undefined,
      editable: false,
      url: undefined,
    },
    {
      name: 'requests',
      version: '==2.25.1',
      ecosystem: 'pypi',
      sourceLocations: [
        { filePath: '/project/requirements.txt', lineNumber: 1, declaration: 'requests==2.25.1', fileType: 'requirements' },
        { filePath: '/project/api/requirements.txt', lineNumber: 3, declaration: 'requests==2.25.1', fileType: 'requirements' },
      ],
      extras: [],
      environmentMarker: undefined,
      editable: false,
      url: undefined,
    },
  ],
  failures: [
    { filePath: '/project/broken/package.json', fileType: 'package-json', message: 'Invalid JSON', lineNumber: undefined },
  ],
  summary: {
    filesScanned: 4,
    filesFailed: 1,
    totalPackages: 2,
    totalLocations: 3,
    byEcosystem: { npm: 1, pypi: 1 },
  },
};

function plain(text: string): string[] {
  return text.replace(/\u001b\[[0-9;]*m/g, '').split('\n');
}

describe('groupByEcosystem', () => {
  it('should order groups by ecosystem', () => {
    expect(groupByEcosystem(RESULT.packages).map(([ecosystem, packages]) => [ecosystem, packages.length])).toEqual([
      ['pypi', 1],
      ['npm', 1],
    ]);
  });
});

describe('displayPath', () => {
  it('should show paths relative to the root', () => {
    expect(displayPath('/project', '/project/web/yarn.lock')).toBe('web/yarn.lock');
    expect(displayPath('/project', '/elsewhere/requirements.txt')).toBe('/elsewhere/requirements.txt');
  });
});

describe('formatTerminal', () => {
  it('should list packages with their locations', () => {
    const lines = plain(formatTerminal(RESULT));

    expect(lines).toContain('PYPI (1)');
    expect(lines).toContain('  requests@==2.25.1');
    expect(lines).toContain('    requirements.txt:1');
    expect(lines).toContain('    api/requirements.txt:3');
    expect(lines).toContain('  \u2717 broken/package.json: Invalid JSON');
    expect(lines).toContain('Total: 2 packages, 3 locations');
  });
});

describe('formatJson', () => {
  it('should serialize the whole result', () => {
    const parsed: unknown = JSON.parse(formatJson(RESULT));
    expect(parsed).toEqual(JSON.parse(JSON.stringify(RESULT)));
  });
});

describe('formatMarkdown', () => {
  it('should render a table per ecosystem', () => {
    const lines = formatMarkdown(RESULT).split('\n');

    expect(lines).toContain('| pypi | 1 |');
    expect(lines).toContain('| **Total** | **2** |');
    expect(lines).toContain('## npm');
    expect(lines).toContain('| `requests` | `==2.25.1` | `requirements.txt:1`<br>`api/requirements.txt:3` |');
    expect(lines).toContain('- `broken/package.json`: Invalid JSON');
  });
});

describe('formatOutput', () => {
  it('should dispatch on the format', () => {
    expect(formatOutput(RESULT, 'json')).toBe(formatJson(RESULT));
    expect(formatOutput(RESULT, 'markdown')).toBe(formatMarkdown(RESULT));
  });
});
