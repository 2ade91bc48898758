#!/usr/bin/env node

import { runInstallerCli } from './install/cli-runtime.js';
import { print, symbols } from './utils.js';

runInstallerCli(process.argv, { planId: 'sky130-pdk' })
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    print(`\n${symbols.error} Fatal error: ${err.message}`, 'red');
    console.error(err.stack);
    process.exit(1);
  });
