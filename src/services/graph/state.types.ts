export type GraphPhase = 'START' | 'CLASSIFIED' | 'RESPONDED';

export interface GraphState<L extends string> {
  phase: GraphPhase;
  userMessage: string;
  intent?: L;
  response?: string;
}
