/**
 * Metric Extractor
 *
 * Maps a chat answer onto the metric schema. The answer may be a JSON object,
 * a markdown table or flattened prose; extraction never throws and always
 * returns one entry per schema label.
 */

import {
  METRIC_SCHEMA,
  bareMetricName,
  createEmptyResult,
  type ExtractionResult,
} from '@reelscope/core';

export type ResponseShape = 'json' | 'table' | 'prose' | 'empty';

export interface ExtractOptions {
  schema?: readonly string[];
}

export interface ExtractionOutcome {
  /** Shape the values were actually read from */
  shape: ResponseShape;
  result: ExtractionResult;
}

/**
 * Leading chatter removed before parsing, applied until none matches
 */
const BOILERPLATE_PATTERNS: readonly RegExp[] = [
  /^\s*AI\s*:\s*/i,
  /^\s*My thought process\s*:?\s*/i,
  /^\s*\|?\s*\**metrics?\**\s*\|?\s*\**values?\**[ \t]*\|?[ \t]*(?:\r?\n[ \t]*\|?[ \t:|-]*-[ \t:|-]*(?=\r?\n|$))?/i,
];

/** A line holding nothing but a code fence, e.g. ```json */
const CODE_FENCE_LINE = /^[ \t]*```[\w-]*[ \t]*$/gm;
const TABLE_SEPARATOR_CELL = /^:?-+:?$/;

export function stripBoilerplate(text: string): string {
  let current = text;
  let changed = true;
  while (changed) {
    changed = false;
    for (const pattern of BOILERPLATE_PATTERNS) {
      const next = current.replace(pattern, '');
      if (next !== current) {
        current = next;
        changed = true;
      }
    }
  }
  return current.trim();
}

/**
 * Collapse a raw value to one clean line
 */
export function cleanValue(value: string): string {
  return value
    .replace(/\|/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s:*]+|[\s:*]+$/g, '')
    .replace(/\s+-$/, '');
}

function parseObjectSlice(text: string): Record<string, unknown> | undefined {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return { ...parsed };
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  return parseObjectSlice(text) ?? parseObjectSlice(text.replace(CODE_FENCE_LINE, ''));
}

function tableLines(text: string): string[] {
  return text.split(/\r?\n/).filter(line => line.includes('|'));
}

/**
 * Structural shape of an answer (after boilerplate is removed)
 */
export function detectShape(text: string): ResponseShape {
  const stripped = stripBoilerplate(text);
  if (stripped === '') return 'empty';
  if (parseJsonObject(stripped)) return 'json';
  if (tableLines(stripped).length >= 2) return 'table';
  return 'prose';
}

function stringifyJsonValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function extractFromJson(
  data: Record<string, unknown>,
  schema: readonly string[]
): ExtractionResult {
  const result = createEmptyResult(schema);
  for (const label of schema) {
    if (Object.prototype.hasOwnProperty.call(data, label)) {
      result[label] = stringifyJsonValue(data[label]);
    }
  }
  return result;
}

function splitRow(line: string): string[] {
  const cells = line.split('|').map(cell => cell.trim());
  if (line.trim().startsWith('|')) cells.shift();
  if (line.trim().endsWith('|')) cells.pop();
  return cells;
}

function stripEmphasis(cell: string): string {
  return cell.replace(/\*\*|__|[*`]/g, '').trim();
}

/**
 * Lower-cased full labels and bare names to schema labels; full labels win
 */
function buildLabelIndex(schema: readonly string[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const label of schema) {
    index.set(label.toLowerCase(), label);
  }
  for (const label of schema) {
    const bare = bareMetricName(label).toLowerCase();
    if (!index.has(bare)) index.set(bare, label);
  }
  return index;
}

function extractFromTable(
  text: string,
  schema: readonly string[]
): { result: ExtractionResult; matched: number } {
  const result = createEmptyResult(schema);
  const index = buildLabelIndex(schema);
  const seen = new Set<string>();

  for (const line of tableLines(text)) {
    const cells = splitRow(line);
    if (cells.length === 0 || cells.every(cell => cell === '' || TABLE_SEPARATOR_CELL.test(cell))) {
      continue;
    }

    const label = index.get(stripEmphasis(cells[0] ?? '').toLowerCase());
    if (label === undefined || seen.has(label)) continue;

    seen.add(label);
    result[label] = cleanValue(cells[1] ?? '');
  }

  return { result, matched: seen.size };
}

interface Anchor {
  label: string;
  start: number;
  end: number;
}

interface AnchorCandidate {
  label: string;
  needle: string;
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /[a-z0-9]/i.test(char);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * First word-bounded, unclaimed occurrence of `needle`, matched
 * case-insensitively on the original text so offsets stay aligned
 */
function findFreeOccurrence(
  text: string,
  needle: string,
  claimed: readonly Anchor[]
): Omit<Anchor, 'label'> | undefined {
  const pattern = new RegExp(escapeRegExp(needle), 'gi');
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const start = match.index;
    const end = start + match[0].length;
    const bounded = !isWordChar(text[start - 1]) && !isWordChar(text[end]);
    const overlaps = claimed.some(anchor => start < anchor.end && end > anchor.start);
    if (bounded && !overlaps) return { start, end };

    pattern.lastIndex = start + 1;
  }
  return undefined;
}

function extractFromProse(text: string, schema: readonly string[]): ExtractionResult {
  const result = createEmptyResult(schema);

  const candidates: AnchorCandidate[] = [];
  for (const label of schema) {
    candidates.push({ label, needle: label });
    const bare = bareMetricName(label);
    if (bare.toLowerCase() !== label.toLowerCase()) {
      candidates.push({ label, needle: bare });
    }
  }
  // Longer candidates claim their span first
  candidates.sort((a, b) => b.needle.length - a.needle.length);

  const anchors: Anchor[] = [];
  for (const candidate of candidates) {
    if (candidate.needle === '' || anchors.some(anchor => anchor.label === candidate.label)) {
      continue;
    }
    const found = findFreeOccurrence(text, candidate.needle, anchors);
    if (found) anchors.push({ label: candidate.label, ...found });
  }

  anchors.sort((a, b) => a.start - b.start);
  anchors.forEach((anchor, i) => {
    const next = anchors[i + 1];
    result[anchor.label] = cleanValue(text.slice(anchor.end, next ? next.start : text.length));
  });

  return result;
}

/**
 * Extract every schema metric and report which shape supplied the values
 */
export function extractWithShape(rawText: string, options: ExtractOptions = {}): ExtractionOutcome {
  const schema = options.schema ?? METRIC_SCHEMA;
  const text = stripBoilerplate(rawText);

  if (text === '') {
    return { shape: 'empty', result: createEmptyResult(schema) };
  }

  const json = parseJsonObject(text);
  if (json) {
    return { shape: 'json', result: extractFromJson(json, schema) };
  }

  if (tableLines(text).length >= 2) {
    const table = extractFromTable(text, schema);
    if (table.matched > 0) {
      return { shape: 'table', result: table.result };
    }
  }

  return { shape: 'prose', result: extractFromProse(text, schema) };
}

/**
 * Extract every schema metric from a chat answer
 */
export function extract(rawText: string, options: ExtractOptions = {}): ExtractionResult {
  return extractWithShape(rawText, options).result;
}
