import { InvalidArgumentError, SUPPORTED_WIDTHS } from '@combinadic/core';
import type { WidthName } from '@combinadic/core';

export type Command = 'count' | 'rank' | 'unrank' | 'list' | 'export' | 'tables' | 'help' | 'version';

const COMMANDS: readonly Command[] = ['count', 'rank', 'unrank', 'list', 'export', 'tables', 'help', 'version'];

export interface CLIOptions {
  command: Command;
  items?: number;
  groupSize?: number;
  width: WidthName;
  sorted: boolean;
  rank?: string;
  combination?: number[];
  output?: string;
  separator?: string;
  groupSeparator?: string;
  lineLength?: number;
  labels?: string;
  reverse: boolean;
  ascendingElements: boolean;
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined) {
    throw new InvalidArgumentError(`${flag} needs a value`);
  }
  return value;
}

function parseInteger(text: string, flag: string): number {
  const value = Number(text);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${flag} expects an integer, got "${text}"`);
  }
  return value;
}

/** Parse "12,11,10" or "12 11 10" into numbers */
export function parseCombination(text: string): number[] {
  const parts = text.split(/[\s,]+/).filter(p => p !== '');
  if (parts.length === 0) {
    throw new InvalidArgumentError('--combination needs at least one value');
  }
  return parts.map(p => parseInteger(p, '--combination'));
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    width: 'int32',
    sorted: true,
    reverse: false,
    ascendingElements: false
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'help':
      case '--help':
      case '-h':
        options.command = 'help';
        break;

      case '--version':
      case '-v':
        options.command = 'version';
        break;

      case '--items':
      case '-n':
        i++;
        options.items = parseInteger(requireValue(args, i, arg), arg);
        break;

      case '--group-size':
      case '-k':
        i++;
        options.groupSize = parseInteger(requireValue(args, i, arg), arg);
        break;

      case '--wide':
      case '-w':
        options.width = 'int64';
        break;

      case '--width': {
        i++;
        const width = requireValue(args, i, arg);
        const match = SUPPORTED_WIDTHS.find(w => w === width);
        if (!match) {
          throw new InvalidArgumentError(`Invalid width: ${width}. Supported: ${SUPPORTED_WIDTHS.join(', ')}`);
        }
        options.width = match;
        break;
      }

      case '--unsorted':
        options.sorted = false;
        break;

      case '--rank':
      case '-r':
        i++;
        options.rank = requireValue(args, i, arg);
        break;

      case '--combination':
      case '-c':
        i++;
        options.combination = parseCombination(requireValue(args, i, arg));
        break;

      case '--output':
      case '-o':
        i++;
        options.output = requireValue(args, i, arg);
        break;

      case '--sep':
        i++;
        options.separator = requireValue(args, i, arg);
        break;

      case '--group-sep':
        i++;
        options.groupSeparator = requireValue(args, i, arg);
        break;

      case '--line-length':
        i++;
        options.lineLength = parseInteger(requireValue(args, i, arg), arg);
        break;

      case '--labels':
        i++;
        options.labels = requireValue(args, i, arg);
        break;

      case '--reverse':
        options.reverse = true;
        break;

      case '--ascending-elements':
        options.ascendingElements = true;
        break;

      default: {
        const command = COMMANDS.find(c => c === arg);
        if (!command) {
          throw new InvalidArgumentError(`Unknown argument: ${arg}`);
        }
        options.command = command;
        break;
      }
    }

    i++;
  }

  return options;
}
