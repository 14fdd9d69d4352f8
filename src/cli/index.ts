#!/usr/bin/env node
/**
 * envoy - CLI Entry Point
 *
 * Usage:
 *   envoy [options] <command> [args...]
 *   envoy --list | --info <command> | --which <command>
 */

import { CLI } from './cli-interface';

async function main(): Promise<void> {
  const cli = new CLI();
  process.exitCode = await cli.run(process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
