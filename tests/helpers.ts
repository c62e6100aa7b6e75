import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { SourceFile } from '../src/parser/source-file.js';

/** In-memory file under /project; nothing touches the disk. */
export function sourceFile(name: string, ...lines: string[]): SourceFile {
  return new SourceFile(join('/project', name), lines.join('\n'));
}

/** Write `files` (relative path → content) into a fresh temporary directory. */
export function createTree(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), 'depscout-'));
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return root;
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
