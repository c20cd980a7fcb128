#!/usr/bin/env node
/**
 * umf CLI entry point
 */

import packageJson from '../../package.json';
import { runCli } from './cli-interface';

async function main(): Promise<void> {
  const exitCode = await runCli(
    process.argv.slice(2),
    {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    },
    { version: packageJson.version }
  );
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
