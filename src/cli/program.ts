import { Command } from 'commander';

import { BaseError, OutputParseError } from '@core/errors/index.js';

import { DEFAULT_SPEC_TEXT } from '@workflows/spec-extraction.workflow.js';

import { extractCommand } from './commands/extract.js';
import { routeCommand } from './commands/route.js';
import { supportCommand } from './commands/support.js';
import {
  createContext,
  parseNonNegativeInt,
  parseTemperature,
  type CliContext,
  type GlobalOptions,
} from './context.js';

export type ContextFactory = (globals: GlobalOptions) => CliContext;

type TemperatureOption = { temperature?: number };

export function createProgram(contextFactory: ContextFactory = createContext): Command {
  const program = new Command();

  program
    .name('workflows')
    .description('Prompt chain, router and support graph workflows over a hosted chat model')
    .version('0.1.0')
    .option('--retries <n>', 'Retry transient model failures n times', parseNonNegativeInt)
    .option('--timeout-ms <n>', 'Fail a workflow run after n milliseconds (0 = no limit)', parseNonNegativeInt);

  const context = (): CliContext => contextFactory(program.opts<GlobalOptions>());

  program
    .command('extract')
    .description('Extract hardware specs from text and return JSON')
    .option('-t, --text <text>', 'Input text containing hardware specs', DEFAULT_SPEC_TEXT)
    .option('--temperature <n>', 'Language model sampling temperature', parseTemperature)
    .action((options: TemperatureOption & { text: string }) => extractCommand(context(), options));

  program
    .command('route')
    .description('Classify requests as booker/info/unclear and delegate them')
    .argument('[requests...]', 'Requests to route (defaults to the demo set)')
    .option('--temperature <n>', 'Language model sampling temperature', parseTemperature)
    .action((requests: string[], options: TemperatureOption) =>
      routeCommand(context(), requests, options),
    );

  program
    .command('support')
    .description('Route support messages through the FAQ/escalate/fallback graph')
    .argument('[messages...]', 'Support messages (defaults to the demo set)')
    .option('--temperature <n>', 'Language model sampling temperature', parseTemperature)
    .action((messages: string[], options: TemperatureOption) =>
      supportCommand(context(), messages, options),
    );

  return program;
}

/** Prints a failed run and returns the process exit code. */
export function reportError(err: unknown): number {
  if (err instanceof OutputParseError) {
    console.error(`${err.code}: ${err.message}\nRaw model output:\n${err.raw}`);
  } else if (err instanceof BaseError) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  return 1;
}
