#!/usr/bin/env node
import { runCsvshiftCli } from './run';

runCsvshiftCli(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
});
