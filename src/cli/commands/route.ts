import type { CliContext } from '../context.js';

import { buildCoordinator, DEMO_REQUESTS } from '@workflows/coordinator.workflow.js';
import type { WorkflowOptions } from '@workflows/workflow.types.js';

export async function routeCommand(
  ctx: CliContext,
  requests: string[],
  options: Pick<WorkflowOptions, 'temperature'> = {},
): Promise<void> {
  const coordinator = buildCoordinator(ctx.client, { temperature: options.temperature, logger: ctx.logger });
  const runs = requests.length
    ? requests.map((text) => ({ label: 'user', text }))
    : DEMO_REQUESTS;

  for (const { label, text } of runs) {
    const result = await ctx.run(() => coordinator.route(text));
    console.log(`\n--- ${label.toUpperCase()} REQUEST ---`);
    console.log(`Routed to   : ${result.label}`);
    console.log(`Final result: ${result.response}`);
  }
}
