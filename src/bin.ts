#!/usr/bin/env node
import 'dotenv/config';
import { main } from './runner.js';
import { formatError, getExitCode } from './errors.js';

main(process.argv).catch(e => {
  console.error(formatError(e));
  process.exit(getExitCode(e));
});
