import { parse as parseTomlText } from 'smol-toml';
import { isMap, isNode, isScalar, parseDocument } from 'yaml';
import type { Document } from 'yaml';
import { ParsingError, errorMessage } from '../errors.js';
import { isRecord } from './source-file.js';
import type { SourceFile } from './source-file.js';

export function parseJsonObject(file: SourceFile): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(file.content);
  } catch (error) {
    throw new ParsingError(`Invalid JSON in ${file.name}: ${errorMessage(error)}`, file.path);
  }
  if (!isRecord(raw)) {
    throw new ParsingError(`Expected a JSON object at the top of ${file.name}`, file.path);
  }
  return raw;
}

export function parseTomlTable(file: SourceFile): Record<string, unknown> {
  try {
    return parseTomlText(file.content);
  } catch (error) {
    throw new ParsingError(`Invalid TOML in ${file.name}: ${errorMessage(error)}`, file.path);
  }
}

/**
 * Parse YAML keeping node ranges, so entries can be mapped back to lines
 * through `SourceFile.lineAt`.
 */
export function parseYamlDocument(file: SourceFile): Document.Parsed {
  const doc = parseDocument(file.content);
  const [first] = doc.errors;
  if (first) {
    const line = first.linePos?.[0].line;
    throw new ParsingError(`Invalid YAML in ${file.name}: ${first.message}`, file.path, line);
  }
  return doc;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface YamlEntry {
  readonly key: string;
  readonly keyNode: unknown;
  readonly value: unknown;
}

/** Key/value pairs of a YAML mapping node with scalar keys; [] for anything else. */
export function yamlMapEntries(node: unknown): YamlEntry[] {
  if (!isMap(node)) return [];
  const entries: YamlEntry[] = [];
  for (const pair of node.items) {
    const key = isScalar(pair.key) ? pair.key.value : pair.key;
    if (typeof key !== 'string' && typeof key !== 'number') continue;
    entries.push({ key: String(key), keyNode: pair.key, value: pair.value });
  }
  return entries;
}

/** Line a YAML node starts on, or `fallback` when the node carries no range. */
export function yamlNodeLine(file: SourceFile, node: unknown, fallback = 1): number {
  if (isNode(node) && node.range) return file.lineAt(node.range[0]);
  return fallback;
}

/** Plain value of a scalar node; undefined for collections. */
export function yamlScalarValue(node: unknown): unknown {
  if (isScalar(node)) return node.value;
  if (isNode(node)) return undefined;
  return node;
}
