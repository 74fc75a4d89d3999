import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { describeError, previewText } from '../common/errors';
import { DEFAULT_LLM_MODEL } from '../config/environment';
import { RECEPTIONIST_PERSONA } from './hotel.profile';
import { LLM_CLIENT, LlmClient } from './llm.provider';

@Injectable()
export class ResponseGenerator {
  private readonly logger = new Logger(ResponseGenerator.name);
  private readonly model: string;

  constructor(
    @Inject(LLM_CLIENT) private readonly llm: LlmClient,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('LLM_MODEL') ?? DEFAULT_LLM_MODEL;
  }

  async generate(query: string, context: string): Promise<string> {
    this.logger.log(`Generating response for query: ${previewText(query)}`);

    try {
      const completion = await this.llm.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: RECEPTIONIST_PERSONA },
          { role: 'user', content: `Query: ${query}\nContext: ${context}` },
        ],
        max_tokens: 300,
        temperature: 0.5,
        top_p: 1,
        stream: false,
      });

      const output = completion.choices[0]?.message?.content;
      if (!output) {
        throw new Error('No output from model');
      }

      this.logger.debug(`Generated response: ${previewText(output)}`);
      return output;
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error generating response: ${message}`);
      return `Error generating response: ${message}`;
    }
  }
}
