import {
  type AnyCombinadicEngine,
  InvalidArgumentError,
  createEngine,
  isWideEngine
} from '@combinadic/core';
import {
  type CombinationFormatOptions,
  formatCombination,
  formatCombinationLines,
  writeCombinationsFile
} from '@combinadic/storage';
import type { CLIOptions } from './args.js';

export const VERSION = '1.0.0';

/** The list command prints to the terminal; larger systems go through export */
export const MAX_LISTED_COMBINATIONS = 100000;

export function helpText(): string {
  return `
Combinadic CLI v${VERSION}

USAGE:
  combinadic <command> [options]

COMMANDS:
  count            Print C(N, K)
  rank             Print the rank of a combination
  unrank           Print the combination at a rank
  list             Print every combination in rank order
  export           Write every combination to a file
  tables           Print the index tables
  help             Show this help message

OPTIONS:
  -n, --items <n>          Number of items (N)
  -k, --group-size <k>     Items per combination (K)
  -w, --wide               Use 64-bit ranks (default: 32-bit)
  --width <int32|int64>    Select the integer width explicitly
  -c, --combination <list> Combination for rank, e.g. 12,11,10,9,8
  --unsorted               The combination is not in descending order
  -r, --rank <r>           Rank for unrank
  -o, --output <file>      Output file for export
  --sep <text>             Separator between values (default: ",")
  --group-sep <text>       Separator between combinations (default: " ")
  --line-length <n>        Wrap output lines at n characters (default: 80)
  --labels <chars>         One display character per item, e.g. 23456789TJQKA
  --reverse                Start from the highest rank
  --ascending-elements     Print values within a combination in ascending order

EXAMPLES:
  # Number of 5-card rank patterns
  combinadic count -n 13 -k 5

  # Rank of the top pattern
  combinadic rank -n 13 -k 5 -c 12,11,10,9,8

  # Write every pattern as card ranks, best first
  combinadic export -n 13 -k 5 --labels 23456789TJQKA --sep "" --reverse -o hands.txt
`;
}

function buildEngine(options: CLIOptions): AnyCombinadicEngine {
  if (options.items === undefined || options.groupSize === undefined) {
    throw new InvalidArgumentError('--items and --group-size are required');
  }
  return createEngine(options.items, options.groupSize, options.width);
}

function formatOptions(options: CLIOptions): CombinationFormatOptions {
  return {
    labels: options.labels,
    separator: options.separator,
    groupSeparator: options.groupSeparator,
    maxLineLength: options.lineLength,
    reverse: options.reverse,
    elementOrder: options.ascendingElements ? 'ascending' : 'descending'
  };
}

function count(options: CLIOptions): string[] {
  const engine = buildEngine(options);
  return [`${engine.itemCount} choose ${engine.groupSize} = ${engine.totalCombinations}`];
}

function rank(options: CLIOptions): string[] {
  if (!options.combination) {
    throw new InvalidArgumentError('--combination is required for rank');
  }
  const engine = buildEngine(options);
  return [String(engine.rank(options.combination, options.sorted))];
}

function unrank(options: CLIOptions): string[] {
  if (options.rank === undefined) {
    throw new InvalidArgumentError('--rank is required for unrank');
  }
  const engine = buildEngine(options);
  const combination = isWideEngine(engine)
    ? engine.unrank(engine.parseRank(options.rank))
    : engine.unrank(engine.parseRank(options.rank));
  return [formatCombination(combination, formatOptions(options))];
}

function list(options: CLIOptions): string[] {
  const engine = buildEngine(options);
  if (BigInt(engine.totalCombinations) > BigInt(MAX_LISTED_COMBINATIONS)) {
    throw new InvalidArgumentError(
      `${engine.totalCombinations} combinations is too many to list; use export with --output`
    );
  }
  return formatCombinationLines(engine, formatOptions(options));
}

function exportFile(options: CLIOptions): string[] {
  if (!options.output) {
    throw new InvalidArgumentError('--output is required for export');
  }
  const engine = buildEngine(options);
  const lines = writeCombinationsFile(engine, options.output, formatOptions(options));
  return [`Wrote ${engine.totalCombinations} combinations (${lines} lines) to: ${options.output}`];
}

function tables(options: CLIOptions): string[] {
  const engine = buildEngine(options);
  const rows = engine.tables();
  if (rows.length === 0) {
    return ['K = 1: no index tables, ranks equal item values'];
  }

  const fieldWidth = String(engine.totalCombinations).length;
  const lines: string[] = [];
  let i = 0;
  for (const row of rows) {
    const cells: string[] = [];
    for (const cell of row) {
      cells.push(String(cell).padStart(fieldWidth));
    }
    lines.push(`T${i}: ${cells.join(' ')}`);
    i++;
  }
  return lines;
}

/**
 * Run one command and return the lines it prints
 */
export function runCommand(options: CLIOptions): string[] {
  switch (options.command) {
    case 'count':
      return count(options);
    case 'rank':
      return rank(options);
    case 'unrank':
      return unrank(options);
    case 'list':
      return list(options);
    case 'export':
      return exportFile(options);
    case 'tables':
      return tables(options);
    case 'version':
      return [`Combinadic CLI v${VERSION}`];
    case 'help':
    default:
      return [helpText()];
  }
}
