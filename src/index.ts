#!/usr/bin/env node
/**
 * readme-refresh - Generate and refresh GitHub READMEs with an LLM
 *
 * Entry point for the CLI application
 */

import 'dotenv/config';
import { createProgram } from './cli';

const program = createProgram();
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
