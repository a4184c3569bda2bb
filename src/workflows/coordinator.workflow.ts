import type { ModelClient } from '@core/interfaces/index.js';

import { ChatPromptTemplate } from '@services/chain/prompt.template.js';
import { Classifier } from '@services/routing/classifier.js';
import { Dispatcher } from '@services/routing/dispatcher.js';
import { createHandlerTable } from '@services/routing/handler.table.js';
import { Router } from '@services/routing/router.js';

import type { WorkflowOptions } from './workflow.types.js';

export const ROUTER_LABELS = ['booker', 'info', 'unclear'] as const;

export type RouterLabel = (typeof ROUTER_LABELS)[number];

export const ROUTER_FALLBACK: RouterLabel = 'unclear';

export const ROUTER_PROMPT = ChatPromptTemplate.fromMessages([
  [
    'system',
    [
      "Analyze the user's request and determine which specialist handler should process it.",
      "- If the request is related to booking flights or hotels, output 'booker'.",
      "- For all other general information questions, output 'info'.",
      "- If the request is unclear or doesn't fit either category, output 'unclear'.",
      "ONLY output one word: 'booker', 'info', or 'unclear'.",
    ].join('\n'),
  ],
  ['user', '{request}'],
]);

export function bookingHandler(request: string): string {
  return `Booking handler processed request: '${request}'. Result: simulated booking action.`;
}

export function infoHandler(request: string): string {
  return `Info handler processed request: '${request}'. Result: simulated information retrieval.`;
}

export function unclearHandler(request: string): string {
  return `Coordinator could not delegate request: '${request}'. Please clarify.`;
}

export const DEMO_REQUESTS: ReadonlyArray<{ label: string; text: string }> = [
  { label: 'booking', text: 'Book me a flight to London.' },
  { label: 'info', text: 'What is the capital of Italy?' },
  { label: 'unclear', text: 'Tell me about quantum physics.' },
];

export function buildCoordinator(
  client: ModelClient,
  options: WorkflowOptions = {},
): Router<RouterLabel, string, string> {
  const { temperature, logger } = options;
  const classifier = new Classifier(client, ROUTER_PROMPT, {
    labels: ROUTER_LABELS,
    fallback: ROUTER_FALLBACK,
    temperature,
    logger,
  });
  const table = createHandlerTable<RouterLabel, string, string>(ROUTER_LABELS, {
    booker: bookingHandler,
    info: infoHandler,
    unclear: unclearHandler,
  });
  return new Router(classifier, new Dispatcher(table, ROUTER_FALLBACK, logger));
}
