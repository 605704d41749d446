import type { Combination } from '@combinadic/core';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Anything that can walk its combinations in rank order.
 * Both engine widths satisfy this.
 */
export interface CombinationSource {
  readonly itemCount: number;
  readonly groupSize: number;
  combinations(descending?: boolean): Iterable<Combination>;
}

/**
 * How combinations are rendered as text
 */
export interface CombinationFormatOptions {
  /**
   * Display text per item. Entry v replaces the number v; a string gives
   * one character per item (e.g. '23456789TJQKA' for card ranks).
   */
  labels?: readonly string[] | string;

  /** Between the values of one combination (default ',') */
  separator?: string;

  /** Between combinations on the same line (default ' ') */
  groupSeparator?: string;

  /** Wrap lines that would grow past this many characters (default 80) */
  maxLineLength?: number;

  /** Start from the last rank instead of rank 0 */
  reverse?: boolean;

  /** Order of values within a combination (default 'descending') */
  elementOrder?: 'descending' | 'ascending';
}

export const DEFAULT_FORMAT_OPTIONS = {
  separator: ',',
  groupSeparator: ' ',
  maxLineLength: 80,
  reverse: false,
  elementOrder: 'descending'
} as const;

/** Characters needed for the largest item index (N - 1) */
export function fieldWidthFor(itemCount: number): number {
  return String(itemCount - 1).length;
}

function labelFor(value: number, labels: readonly string[] | string | undefined): string | undefined {
  if (labels === undefined || value >= labels.length) {
    return undefined;
  }
  return labels[value];
}

/**
 * Render one combination. Numbers are right-aligned to `fieldWidth` when
 * no label replaces them.
 */
export function formatCombination(
  values: readonly number[],
  options: CombinationFormatOptions = {},
  fieldWidth: number = 1
): string {
  const separator = options.separator ?? DEFAULT_FORMAT_OPTIONS.separator;
  const ordered = options.elementOrder === 'ascending' ? [...values].reverse() : values;
  return ordered
    .map(v => labelFor(v, options.labels) ?? String(v).padStart(fieldWidth))
    .join(separator);
}

function* formatEach(source: CombinationSource, options: CombinationFormatOptions): Generator<string> {
  const fieldWidth = fieldWidthFor(source.itemCount);
  for (const combination of source.combinations(options.reverse ?? DEFAULT_FORMAT_OPTIONS.reverse)) {
    yield formatCombination(combination, options, fieldWidth);
  }
}

/**
 * One string per combination, in rank order (or reversed)
 */
export function formatCombinationList(source: CombinationSource, options: CombinationFormatOptions = {}): string[] {
  return [...formatEach(source, options)];
}

/**
 * Combinations packed onto lines of at most `maxLineLength` characters.
 * A line is closed when the next combination and its separator would not
 * fit; a combination longer than the limit gets a line to itself.
 */
export function formatCombinationLines(source: CombinationSource, options: CombinationFormatOptions = {}): string[] {
  const groupSeparator = options.groupSeparator ?? DEFAULT_FORMAT_OPTIONS.groupSeparator;
  const maxLineLength = options.maxLineLength ?? DEFAULT_FORMAT_OPTIONS.maxLineLength;

  const lines: string[] = [];
  let line = '';
  for (const text of formatEach(source, options)) {
    if (line === '') {
      line = text;
      continue;
    }
    const candidate = line + groupSeparator + text;
    if (candidate.length > maxLineLength) {
      lines.push(line);
      line = text;
    } else {
      line = candidate;
    }
  }
  if (line !== '') {
    lines.push(line);
  }
  return lines;
}

/**
 * Write every combination to a text file, creating parent directories.
 * Returns the number of lines written.
 */
export function writeCombinationsFile(
  source: CombinationSource,
  filePath: string,
  options: CombinationFormatOptions = {}
): number {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const lines = formatCombinationLines(source, options);
  fs.writeFileSync(filePath, lines.join('\n') + '\n', 'utf-8');
  return lines.length;
}

/**
 * Generate a filename for an export of this N choose K system
 */
export function generateExportFilename(source: CombinationSource, timestamp: number = Date.now()): string {
  return `${source.itemCount}-choose-${source.groupSize}_${timestamp}.txt`;
}

/**
 * List all export files in a directory
 */
export function listExportFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }

  return fs.readdirSync(dir)
    .filter(f => f.endsWith('.txt'))
    .sort()
    .map(f => path.join(dir, f));
}
