import type { CliContext } from '../context.js';

import { buildSupportGraph, DEMO_MESSAGES } from '@workflows/support.workflow.js';
import type { WorkflowOptions } from '@workflows/workflow.types.js';

export async function supportCommand(
  ctx: CliContext,
  messages: string[],
  options: Pick<WorkflowOptions, 'temperature'> = {},
): Promise<void> {
  const graph = buildSupportGraph(ctx.client, { temperature: options.temperature, logger: ctx.logger });

  for (const message of messages.length ? messages : DEMO_MESSAGES) {
    const result = await ctx.run(() => graph.invoke(message));
    console.log('\n--- SUPPORT RUN ---');
    console.log(`Message : ${message}`);
    console.log(`Intent  : ${result.intent}`);
    console.log(`Reply   : ${result.response}`);
  }
}
