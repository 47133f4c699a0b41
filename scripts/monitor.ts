#!/usr/bin/env node
import { run } from '../src/lib/cli';

run(process.argv.slice(2), { write: text => console.log(text) })
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error(`[scout] Fatal: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  });
