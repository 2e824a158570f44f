#!/usr/bin/env node
// packages/node-runtime/src/main.ts
import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2));
