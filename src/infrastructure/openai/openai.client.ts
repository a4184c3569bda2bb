import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import { TEMPERATURE_MAX, TEMPERATURE_MIN, type AppConfig } from '@config/env.config';

import { ModelInvocationError } from '@core/errors/model-invocation.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type {
  ChatMessage,
  GenerateOptions,
  ModelClient,
  PromptValue,
} from '@core/interfaces/index.js';

import { logger as defaultLogger, type Logger } from '@utils/logger.js';

type OpenAIConfig = Pick<AppConfig, 'OPENAI_API_KEY' | 'OPENAI_BASE_URL'>;

export function createOpenAI(config: OpenAIConfig): OpenAI {
  // retries belong to the caller, never the SDK
  return new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: 0,
  });
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
    default:
      return { role: 'user', content: message.content };
  }
}

function toMessages(prompt: PromptValue): ChatCompletionMessageParam[] {
  if (typeof prompt === 'string') {
    return [{ role: 'user', content: prompt }];
  }
  return prompt.map(toMessageParam);
}

function describeFailure(error: unknown): { message: string; status?: number } {
  if (error instanceof OpenAI.APIError) {
    return { message: error.message, status: error.status };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}

export interface OpenAIModelClientOptions {
  model: string;
  defaultTemperature: number;
  logger?: Logger;
}

export class OpenAIModelClient implements ModelClient {
  private readonly logger: Logger;

  constructor(
    private readonly openai: OpenAI,
    private readonly options: OpenAIModelClientOptions,
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async generate(prompt: PromptValue, options: GenerateOptions = {}): Promise<string> {
    const temperature = options.temperature ?? this.options.defaultTemperature;
    if (
      !Number.isFinite(temperature) ||
      temperature < TEMPERATURE_MIN ||
      temperature > TEMPERATURE_MAX
    ) {
      throw new ValidationError(
        `temperature must be between ${TEMPERATURE_MIN} and ${TEMPERATURE_MAX}`,
        ['temperature'],
      );
    }

    const started = Date.now();
    try {
      const completion = await this.openai.chat.completions.create({
        model: this.options.model,
        temperature,
        messages: toMessages(prompt),
      });
      const content = completion.choices?.[0]?.message?.content ?? '';
      this.logger.debug(
        { model: this.options.model, latencyMs: Date.now() - started },
        '[model] completion received',
      );
      return content;
    } catch (error) {
      const { message, status } = describeFailure(error);
      this.logger.error({ model: this.options.model, status }, '[model] completion failed');
      throw new ModelInvocationError(message, status, error);
    }
  }
}

export function createModelClient(
  config: Pick<AppConfig, 'OPENAI_API_KEY' | 'OPENAI_BASE_URL' | 'OPENAI_MODEL' | 'OPENAI_TEMPERATURE'>,
  logger?: Logger,
): ModelClient {
  return new OpenAIModelClient(createOpenAI(config), {
    model: config.OPENAI_MODEL,
    defaultTemperature: config.OPENAI_TEMPERATURE,
    logger,
  });
}
