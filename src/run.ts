#!/usr/bin/env node
/**
 * CLI entrypoint for normalizing and converting source payloads
 *
 * Usage:
 *   npx tsx src/run.ts --source twitter --input timeline.json --format atom
 *   npx tsx src/run.ts --source mastodon --input statuses.json --startIndex 20 --count 20
 *   npx tsx src/run.ts --source bluesky --input profile.json --actor
 */

import { runCli } from './cli.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
