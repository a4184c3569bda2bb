export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** What a rendered template hands to the model: a bare prompt or a message list. */
export type PromptValue = string | readonly ChatMessage[];

export interface GenerateOptions {
  temperature?: number;
}

export interface ModelClient {
  generate(prompt: PromptValue, options?: GenerateOptions): Promise<string>;
}
