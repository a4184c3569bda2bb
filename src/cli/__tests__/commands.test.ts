import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { loadConfig } from '@config/env.config';

import { OutputParseError } from '@core/errors/output-parse.error.js';

import { createStubModel } from '@test/utils/stub-model.js';

import { createLogger } from '@utils/logger.js';

import {
  bookingHandler,
  DEMO_REQUESTS,
  infoHandler,
  unclearHandler,
} from '@workflows/coordinator.workflow.js';
import { DEFAULT_SPEC_TEXT } from '@workflows/spec-extraction.workflow.js';
import { DEMO_MESSAGES, ESCALATION_REPLY, FALLBACK_REPLY } from '@workflows/support.workflow.js';

import { extractCommand } from '../commands/extract.js';
import { routeCommand } from '../commands/route.js';
import { supportCommand } from '../commands/support.js';
import { createContext, type CliContext, type GlobalOptions } from '../context.js';
import { createProgram, reportError } from '../program.js';

const env = { OPENAI_API_KEY: 'test-key', NODE_ENV: 'test', LOG_LEVEL: 'silent' };

function stubContext(respond: (prompt: string) => string) {
  const config = loadConfig(env);
  const { client, generate } = createStubModel(respond);
  const ctx: CliContext = {
    config,
    logger: createLogger(config),
    client,
    run: (fn) => fn(),
  };
  return { ctx, generate };
}

const extractReply = (transformReply: string) => (prompt: string) =>
  prompt.startsWith('Extract the technical specifications')
    ? 'CPU: 3.2GHz\nMemory: 32GB\nStorage: 2TB'
    : transformReply;

function routeReply(prompt: string): string {
  if (prompt.endsWith('Book me a flight to London.') || prompt.endsWith('Book a hotel in Rome.')) {
    return 'booker';
  }
  if (prompt.endsWith('What is the capital of Italy?')) return 'Info.';
  return 'maybe?';
}

function supportReply(prompt: string): string {
  if (!prompt.startsWith('Classify')) return '  Use the reset link on the sign-in page. ';
  if (prompt.includes('reset my password')) return 'faq';
  if (prompt.includes('charged twice')) return 'escalate';
  return 'not sure';
}

describe('cli commands', () => {
  let log: MockInstance<typeof console.log>;

  const printed = (): unknown[] => log.mock.calls.map((args) => args[0]);

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('extract prints the parsed specs as indented JSON', async () => {
    const { ctx, generate } = stubContext(extractReply('{"cpu":"3.2GHz","memory":"32GB","storage":"2TB"}'));

    await extractCommand(ctx, { text: DEFAULT_SPEC_TEXT });

    expect(printed()).toEqual([
      '\n--- Final JSON Output ---',
      '{\n  "cpu": "3.2GHz",\n  "memory": "32GB",\n  "storage": "2TB"\n}',
    ]);
    expect(generate).toHaveBeenNthCalledWith(
      1,
      `Extract the technical specifications from the following text:\n\n${DEFAULT_SPEC_TEXT}`,
      { temperature: undefined },
    );
  });

  it('route falls back to the demo requests when none are given', async () => {
    const { ctx, generate } = stubContext(routeReply);

    await routeCommand(ctx, []);

    expect(generate).toHaveBeenCalledTimes(DEMO_REQUESTS.length);
    expect(printed()).toEqual([
      '\n--- BOOKING REQUEST ---',
      'Routed to   : booker',
      `Final result: ${bookingHandler('Book me a flight to London.')}`,
      '\n--- INFO REQUEST ---',
      'Routed to   : info',
      `Final result: ${infoHandler('What is the capital of Italy?')}`,
      '\n--- UNCLEAR REQUEST ---',
      'Routed to   : unclear',
      `Final result: ${unclearHandler('Tell me about quantum physics.')}`,
    ]);
  });

  it('route labels explicit requests as user requests', async () => {
    const { ctx } = stubContext(routeReply);

    await routeCommand(ctx, ['Book a hotel in Rome.']);

    expect(printed()).toEqual([
      '\n--- USER REQUEST ---',
      'Routed to   : booker',
      `Final result: ${bookingHandler('Book a hotel in Rome.')}`,
    ]);
  });

  it('support falls back to the demo messages when none are given', async () => {
    const { ctx, generate } = stubContext(supportReply);

    await supportCommand(ctx, []);

    // one classify call per message plus the FAQ answer
    expect(generate).toHaveBeenCalledTimes(DEMO_MESSAGES.length + 1);
    expect(printed()).toEqual([
      '\n--- SUPPORT RUN ---',
      'Message : How do I reset my password?',
      'Intent  : faq',
      'Reply   : Use the reset link on the sign-in page.',
      '\n--- SUPPORT RUN ---',
      'Message : My credit card was charged twice, help.',
      'Intent  : escalate',
      `Reply   : ${ESCALATION_REPLY}`,
      '\n--- SUPPORT RUN ---',
      'Message : Tell me something interesting.',
      'Intent  : fallback',
      `Reply   : ${FALLBACK_REPLY}`,
    ]);
  });
});

describe('cli program', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('passes global options to the context factory', async () => {
    const { ctx } = stubContext(routeReply);
    const factory = vi.fn((_globals: GlobalOptions) => ctx);

    await createProgram(factory).parseAsync(['--retries', '2', 'route', 'Book a hotel in Rome.'], {
      from: 'user',
    });

    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory.mock.calls[0]?.[0]).toMatchObject({ retries: 2 });
    expect(log).toHaveBeenCalledWith('Routed to   : booker');
  });

  it('applies --temperature to route', async () => {
    const { ctx, generate } = stubContext(routeReply);

    await createProgram(() => ctx).parseAsync(
      ['route', '--temperature', '0.4', 'Book a hotel in Rome.'],
      { from: 'user' },
    );

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith(expect.anything(), { temperature: 0.4 });
  });

  it('applies --temperature to support', async () => {
    const { ctx, generate } = stubContext(supportReply);

    await createProgram(() => ctx).parseAsync(
      ['support', '--temperature', '1.5', 'Where is my invoice?'],
      { from: 'user' },
    );

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith(expect.anything(), { temperature: 1.5 });
    expect(log).toHaveBeenCalledWith(`Reply   : ${FALLBACK_REPLY}`);
  });

  it('runs extract with the demo text when --text is omitted', async () => {
    const { ctx, generate } = stubContext(extractReply('{"cpu":"3.2GHz","memory":"32GB","storage":"2TB"}'));

    await createProgram(() => ctx).parseAsync(['extract'], { from: 'user' });

    expect(generate).toHaveBeenNthCalledWith(
      1,
      `Extract the technical specifications from the following text:\n\n${DEFAULT_SPEC_TEXT}`,
      { temperature: undefined },
    );
    expect(log).toHaveBeenCalledWith('\n--- Final JSON Output ---');
  });
});

describe('reportError', () => {
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the raw model text of an unparseable extraction and exits with 1', async () => {
    const { ctx } = stubContext(extractReply('not json'));

    const failure = await createProgram(() => ctx)
      .parseAsync(['extract'], { from: 'user' })
      .then(
        () => undefined,
        (err: unknown) => err,
      );

    expect(failure).toBeInstanceOf(OutputParseError);
    expect(reportError(failure)).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'OUTPUT_PARSE_ERROR: Model output is not valid JSON\nRaw model output:\nnot json',
    );
  });

  it('prints configuration errors as-is', async () => {
    const failure = await createProgram((globals) => createContext(globals, { NODE_ENV: 'test' }))
      .parseAsync(['route'], { from: 'user' })
      .then(
        () => undefined,
        (err: unknown) => err,
      );

    expect(reportError(failure)).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'CONFIGURATION_ERROR: Invalid environment configuration:\n- OPENAI_API_KEY: OPENAI_API_KEY is required\nUpdate your .env or environment variables and try again.',
    );
  });

  it('reports anything else as fatal', () => {
    const boom = new Error('boom');

    expect(reportError(boom)).toBe(1);
    expect(error).toHaveBeenCalledWith('Fatal error:', boom);
  });
});
