import type { CliContext } from '../context.js';

import { extractSpecifications } from '@workflows/spec-extraction.workflow.js';

export interface ExtractOptions {
  text: string;
  temperature?: number;
}

export async function extractCommand(ctx: CliContext, options: ExtractOptions): Promise<void> {
  const result = await ctx.run(() =>
    extractSpecifications(ctx.client, options.text, {
      temperature: options.temperature,
      logger: ctx.logger,
    }),
  );
  console.log('\n--- Final JSON Output ---');
  console.log(JSON.stringify(result, null, 2));
}
