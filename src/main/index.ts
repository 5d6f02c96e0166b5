#!/usr/bin/env node
import { runCli } from './cli';
import { createConfig } from './config';
import log from './utils/logger';

runCli(process.argv.slice(2), createConfig())
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    log.error(error);
    process.exitCode = 1;
  });
