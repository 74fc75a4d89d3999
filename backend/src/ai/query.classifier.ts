import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { describeError, previewText } from '../common/errors';
import { DEFAULT_LLM_MODEL } from '../config/environment';
import { LLM_CLIENT, LlmClient } from './llm.provider';

export const buildClassificationPrompt = (query: string): string =>
  [
    'Classify the following query into one of two categories:',
    '1. Checking details - if the query is about wanting to book a hotel room',
    '2. Getting information - if the query is about wanting to know general information related to the hotel.',
    '',
    `Query: ${query}`,
    '',
    'Respond with only the category number (1 or 2).',
  ].join('\n');

@Injectable()
export class QueryClassifier {
  private readonly logger = new Logger(QueryClassifier.name);
  private readonly model: string;

  constructor(
    @Inject(LLM_CLIENT) private readonly llm: LlmClient,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('LLM_MODEL') ?? DEFAULT_LLM_MODEL;
  }

  /**
   * Asks the model for a single category digit. Resolves to the trimmed output,
   * which callers still have to check, or `null` when the call itself failed.
   */
  async classify(query: string): Promise<string | null> {
    this.logger.log(`Classifying query: ${previewText(query)}`);

    try {
      const completion = await this.llm.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: buildClassificationPrompt(query) }],
        max_tokens: 10,
        temperature: 0.5,
        top_p: 1,
        stream: false,
      });

      const output = completion.choices[0]?.message?.content;
      if (!output) {
        throw new Error('No output from model');
      }

      const category = output.trim();
      this.logger.log(`Query classified as type: ${category}`);
      return category;
    } catch (error) {
      this.logger.error(`Error classifying query: ${describeError(error)}`);
      return null;
    }
  }
}
