#!/usr/bin/env node
// packages/cli/src/index.ts
//
//   txcanon address --secret "..."
//   txcanon create transfer --secret "..." --recipient B... --amount 100000000 > tx.json
//   txcanon verify tx.json
//   txcanon bytes tx.json --signature

import { TransactionError } from '@txcanon/transactions';
import { debugEnabled } from '@txcanon/utils';

import { defaultDeps } from './io.js';
import { createProgram } from './program.js';

const deps = defaultDeps();

// --- MUST await parseAsync or Node may exit before Commander prints/help runs ---
(async () => {
  await createProgram(deps).parseAsync(process.argv);
})().catch((err: unknown) => {
  if (err instanceof TransactionError) {
    deps.err(`${err.code}: ${err.message}`);
  } else if (err instanceof Error) {
    deps.err(debugEnabled('cli') && err.stack ? err.stack : err.message);
  } else {
    deps.err(String(err));
  }
  deps.setExitCode(1);
});
