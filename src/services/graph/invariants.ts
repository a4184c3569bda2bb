import type { GraphState } from './state.types.js';

export function assertGraphInvariants<L extends string>(
  state: GraphState<L>,
  labels: readonly L[],
): string[] {
  const issues: string[] = [];
  if (typeof state.userMessage !== 'string') {
    issues.push('userMessage_required');
  }
  switch (state.phase) {
    case 'START':
      if (state.intent !== undefined) issues.push('intent_unexpected');
      if (state.response !== undefined) issues.push('response_unexpected');
      break;
    case 'CLASSIFIED':
      if (state.intent === undefined) {
        issues.push('intent_required');
      } else if (!labels.includes(state.intent)) {
        issues.push('intent_unknown');
      }
      if (state.response !== undefined) issues.push('response_unexpected');
      break;
    case 'RESPONDED':
      if (state.intent === undefined) issues.push('intent_required');
      if (typeof state.response !== 'string') issues.push('response_required');
      break;
  }
  return issues;
}
