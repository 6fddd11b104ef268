#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import { config } from 'dotenv';
import { Command } from 'commander';
import { ZodError } from 'zod';
import { CLI } from './cli.js';
import { getModelIdForProvider } from './model/providers.js';
import { parseTaskRequest } from './agent/schemas.js';
import { serializeRunResult } from './agent/response.js';
import { RunCancelledError } from './agent/errors.js';
import { createServices } from './services.js';
import { DEFAULT_MODEL, DEFAULT_PROVIDER } from './model/llm.js';
import { configureLogger, getSetting } from './utils/index.js';

// Load environment variables
config({ quiet: true });

interface HeadlessOptions {
  rag: boolean;
  temperature?: number;
}

const LOG_FILE = '.codesmith/codesmith.log';

async function runHeadless(query: string, options: HeadlessOptions): Promise<number> {
  const request = parseTaskRequest({
    message: query,
    use_rag: options.rag,
    temperature: options.temperature,
  });

  const provider = getSetting<string>('provider', DEFAULT_PROVIDER, (value): value is string => typeof value === 'string');
  const { orchestrator } = createServices({ model: getModelIdForProvider(provider) ?? DEFAULT_MODEL });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new RunCancelledError()));

  const result = await orchestrator.run(request, { signal: controller.signal });
  process.stdout.write(`${JSON.stringify(serializeRunResult(result), null, 2)}\n`);
  return result.status === 'COMPLETED' ? 0 : 1;
}

const program = new Command();

program
  .name('codesmith')
  .description('Multi-agent coding assistant')
  .argument('[query]', 'Run a single request and print the result as JSON')
  .option('--no-rag', 'Skip retrieval of reference material')
  .option('-t, --temperature <n>', 'Sampling temperature (0-2)', value => Number.parseFloat(value))
  .action(async (query: string | undefined, options: HeadlessOptions) => {
    if (query === undefined) {
      // Keep log lines off the terminal Ink is drawing on.
      configureLogger({ file: LOG_FILE });
      render(<CLI />);
      return;
    }
    process.exitCode = await runHeadless(query, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof ZodError
    ? error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('\n')
    : error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
