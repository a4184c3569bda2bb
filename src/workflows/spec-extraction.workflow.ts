import { z } from 'zod';

import type { ModelClient } from '@core/interfaces/index.js';

import { assign, Chain, parseOutput, renderAndGenerate, type GenerateInput } from '@services/chain/chain.js';
import { JsonOutputParser, StringOutputParser } from '@services/chain/output.parser.js';
import { PromptTemplate } from '@services/chain/prompt.template.js';

import type { WorkflowOptions } from './workflow.types.js';

export const DEFAULT_SPEC_TEXT =
  'The new laptop model features a 3.5 GHz octa-core processor, 16GB of RAM, and a 1TB NVMe SSD.';

export const EXTRACT_PROMPT = PromptTemplate.fromTemplate(
  'Extract the technical specifications from the following text:\n\n{text_input}',
);

export const TRANSFORM_PROMPT = PromptTemplate.fromTemplate(
  "Transform the following specifications into a JSON object with 'cpu', 'memory', and 'storage' as keys:\n\n{specifications}",
);

// unknown keys are stripped, so a parsed result carries exactly these three
export const HardwareSpecsSchema = z.object({
  cpu: z.string(),
  memory: z.string(),
  storage: z.string(),
});

export type HardwareSpecs = z.infer<typeof HardwareSpecsSchema>;

export type SpecExtractionInput = {
  text_input: string;
};

/**
 * extract (free text) -> transform (JSON text) -> parse. The first chain's
 * output is bound to `{specifications}` in the transform prompt.
 */
export function buildSpecExtractionChain(
  client: ModelClient,
  options: WorkflowOptions = {},
): Chain<GenerateInput, HardwareSpecs> {
  const { temperature, logger } = options;

  const extraction = Chain.from(
    renderAndGenerate(client, EXTRACT_PROMPT, { temperature, name: 'extract' }),
    { logger },
  ).pipe(parseOutput(new StringOutputParser()));

  return Chain.from(assign('specifications', extraction), { logger })
    .pipe(renderAndGenerate(client, TRANSFORM_PROMPT, { temperature, name: 'transform' }))
    .pipe(parseOutput(new JsonOutputParser(HardwareSpecsSchema)));
}

export function extractSpecifications(
  client: ModelClient,
  textInput: string,
  options: WorkflowOptions = {},
): Promise<HardwareSpecs> {
  const input: SpecExtractionInput = { text_input: textInput };
  return buildSpecExtractionChain(client, options).invoke(input);
}
