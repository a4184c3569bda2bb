import type { ModelClient } from '@core/interfaces/index.js';

import { Chain, parseOutput, renderAndGenerate } from '@services/chain/chain.js';
import { StringOutputParser } from '@services/chain/output.parser.js';
import { PromptTemplate } from '@services/chain/prompt.template.js';
import { ClassificationGraph } from '@services/graph/classification.graph.js';
import { Classifier } from '@services/routing/classifier.js';

import type { WorkflowOptions } from './workflow.types.js';

export const SUPPORT_LABELS = ['faq', 'escalate', 'fallback'] as const;

export type SupportLabel = (typeof SUPPORT_LABELS)[number];

export const SUPPORT_FALLBACK: SupportLabel = 'fallback';

export const SUPPORT_CLASSIFIER_PROMPT = PromptTemplate.fromTemplate(
  [
    'Classify the user message and respond with one word:',
    "- 'faq' for routine, answerable questions.",
    "- 'escalate' for billing/account/security issues.",
    "- 'fallback' when unsure.",
    'Message: {message}',
  ].join('\n'),
);

export const FAQ_PROMPT = PromptTemplate.fromTemplate(
  'You are a helpful support agent. Provide a concise answer to: {message}',
);

export const ESCALATION_REPLY =
  "Your request looks sensitive or complex. I've escalated it to a human specialist who will follow up shortly.";

export const FALLBACK_REPLY = "I couldn't determine the best path. Could you share more details?";

export const DEMO_MESSAGES: readonly string[] = [
  'How do I reset my password?',
  'My credit card was charged twice, help.',
  'Tell me something interesting.',
];

export function buildSupportGraph(
  client: ModelClient,
  options: WorkflowOptions = {},
): ClassificationGraph<SupportLabel> {
  const { temperature, logger } = options;

  const classifier = new Classifier(client, SUPPORT_CLASSIFIER_PROMPT, {
    labels: SUPPORT_LABELS,
    fallback: SUPPORT_FALLBACK,
    temperature,
    logger,
  });

  const faq = Chain.from(renderAndGenerate(client, FAQ_PROMPT, { temperature, name: 'answer_faq' }), {
    logger,
  }).pipe(parseOutput(new StringOutputParser()));

  return new ClassificationGraph({
    classifier,
    logger,
    nodes: {
      faq: (state) => faq.invoke(state.userMessage),
      escalate: () => ESCALATION_REPLY,
      fallback: () => FALLBACK_REPLY,
    },
  });
}
