#!/usr/bin/env node
import { createProgram } from './program.js';
import { runSync } from './run.js';

async function main(): Promise<void> {
  const program = createProgram(async (tasksFile, options) => {
    process.exitCode = await runSync(tasksFile, options);
  });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
