#!/usr/bin/env node
/**
 * Jenkins DinD setup CLI
 */

import { exit } from 'node:process';
import { runCli } from './run';

runCli(process.argv.slice(2)).then(
  (code) => exit(code),
  (error: unknown) => {
    console.error(error);
    exit(1);
  },
);
