#!/usr/bin/env node

import { Command } from 'commander';
import { registerCaptureCommand } from './commands/capture.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pagecap')
    .description('Capture a single rendered web page as metadata, clean HTML, Markdown and text')
    .version('0.1.0');

  registerCaptureCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
