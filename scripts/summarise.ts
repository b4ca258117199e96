#!/usr/bin/env npx tsx
/**
 * Consultation summary CLI
 *
 * Usage:
 *   npx tsx scripts/summarise.ts list-orgs
 *   npx tsx scripts/summarise.ts list-questions
 *   npx tsx scripts/summarise.ts summary-org --response-id R_123 [--no-cache]
 *   npx tsx scripts/summarise.ts summary-question --question-id Q05 [--no-cache]
 */

import { runCli } from "../src/lib/cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
