import { readFileSync } from 'node:fs';
import { resolve, basename } from 'node:path';
import { ParsingError, errorMessage } from '../errors.js';
import type { FileType, SourceLocation } from '../types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * A dependency file held in memory, with helpers for mapping parsed entries
 * back to the line they were declared on.
 */
export class SourceFile {
  readonly path: string;
  readonly name: string;
  readonly content: string;
  readonly lines: readonly string[];
  private lineOffsets: number[] | undefined;

  constructor(path: string, content: string) {
    this.path = resolve(path);
    this.name = basename(this.path);
    this.content = content.startsWith('\uFEFF') ? content.slice(1) : content;
    this.lines = this.content.split(/\r?\n/);
  }

  get isBlank(): boolean {
    return this.content.trim() === '';
  }

  /** Text of a 1-indexed line, or '' past the end. */
  line(lineNumber: number): string {
    return this.lines[lineNumber - 1] ?? '';
  }

  /** First line at or after `fromLine` containing `needle` (or matching it, for a RegExp). */
  findLine(needle: string | RegExp, fromLine = 1): number | undefined {
    for (let i = Math.max(fromLine, 1) - 1; i < this.lines.length; i++) {
      const line = this.lines[i]!;
      if (typeof needle === 'string' ? line.includes(needle) : needle.test(line)) return i + 1;
    }
    return undefined;
  }

  /** 1-indexed line of a character offset into `content`. */
  lineAt(offset: number): number {
    if (!this.lineOffsets) {
      this.lineOffsets = [0];
      for (let i = 0; i < this.content.length; i++) {
        if (this.content.charCodeAt(i) === 10) this.lineOffsets.push(i + 1);
      }
    }

    let low = 0;
    let high = this.lineOffsets.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineOffsets[mid]! <= offset) low = mid;
      else high = mid - 1;
    }
    return low + 1;
  }

  location(lineNumber: number, declaration: string, fileType: FileType): SourceLocation {
    return {
      filePath: this.path,
      lineNumber: Math.max(lineNumber, 1),
      declaration: declaration.trim(),
      fileType,
    };
  }
}

/**
 * Read a file as UTF-8, falling back to Latin-1 when the bytes are not valid UTF-8.
 */
export function readSourceFile(path: string): SourceFile {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    throw new ParsingError(`Could not read file: ${errorMessage(error)}`, resolve(path));
  }

  let content: string;
  try {
    content = utf8.decode(bytes);
  } catch {
    content = bytes.toString('latin1');
  }
  return new SourceFile(path, content);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
