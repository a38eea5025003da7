#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stderr, exit as processExit } from 'node:process';
import { buildProgram } from './program.js';

process.on('uncaughtException', err => {
  if (err instanceof Error) {
    const name = err.constructor.name;
    const msg = err.message;
    stderr.write(`Error [${name}]: ${msg}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
});

buildProgram().parse(process.argv);
