#!/usr/bin/env node
/**
 * @fileoverview titlecast CLI Entry Point
 */
import { formatError } from '@titlecast/core';
import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', formatError(error));
    process.exitCode = 1;
  });
