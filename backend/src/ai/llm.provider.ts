import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { DEFAULT_LLM_BASE_URL } from '../config/environment';

export const LLM_CLIENT = Symbol('LLM_CLIENT');

/** The slice of the OpenAI SDK the concierge calls. Groq serves the same API. */
export type LlmClient = Pick<OpenAI, 'chat'>;

export const llmClientProvider: Provider<LlmClient> = {
  provide: LLM_CLIENT,
  inject: [ConfigService],
  useFactory: (configService: ConfigService): LlmClient =>
    new OpenAI({
      apiKey: configService.getOrThrow<string>('GROQ_API_KEY'),
      baseURL: configService.get<string>('LLM_BASE_URL') ?? DEFAULT_LLM_BASE_URL,
      // Upstream failures surface on the first attempt
      maxRetries: 0,
    }),
};
