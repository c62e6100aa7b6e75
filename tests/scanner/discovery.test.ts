import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { discoverManifestFiles } from '../../src/scanner/discovery.js';
import { createTree, removeTree } from '../helpers.js';

describe('discoverManifestFiles', () => {
  let root: string;

  beforeEach(() => {
    root = createTree({
      'requirements.txt': 'flask\n',
      'web/package.json': '{}\n',
      'node_modules/lodash/package.json': '{}\n',
      '.venv/lib/requirements.txt': 'six\n',
      'docs/readme.md': '# docs\n',
      'services/api/Dockerfile': 'FROM node:18\n',
      'vendor/poetry.lock': '',
    });
  });

  afterEach(() => {
    removeTree(root);
  });

  it('should find recognized files in a deterministic order and skip excluded directories', () => {
    expect(discoverManifestFiles(root, ['vendor'])).toEqual([
      join(root, 'requirements.txt'),
      join(root, 'services', 'api', 'Dockerfile'),
      join(root, 'web', 'package.json'),
    ]);
  });

  it('should only skip the built-in directories by default', () => {
    expect(discoverManifestFiles(root)).toContain(join(root, 'vendor', 'poetry.lock'));
  });
});
