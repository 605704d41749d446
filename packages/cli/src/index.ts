#!/usr/bin/env tsx

import { parseArgs } from './args.js';
import { runCommand } from './commands.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  for (const line of runCommand(options)) {
    console.log(line);
  }
}

main().catch(err => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
