import { Injectable, Logger } from '@nestjs/common';

import { previewText } from '../common/errors';
import { ConciergeEvent, LoggingService } from '../logging/logging.service';
import { ConciergeOutcome, isQueryCategory } from './ai.types';
import { ContextResolver } from './context.resolver';
import { QueryClassifier } from './query.classifier';
import { ResponseGenerator } from './response.generator';

@Injectable()
export class ConciergeService {
  private readonly logger = new Logger(ConciergeService.name);

  constructor(
    private readonly classifier: QueryClassifier,
    private readonly contextResolver: ContextResolver,
    private readonly responseGenerator: ResponseGenerator,
    private readonly loggingService: LoggingService,
  ) {}

  /**
   * Classify, then resolve context, then generate. Only an answered outcome
   * reaches the generator.
   */
  async answer(
    query: string,
    source: ConciergeEvent['source'] = 'query',
  ): Promise<ConciergeOutcome> {
    const category = await this.classifier.classify(query);

    if (category === null) {
      this.logger.error(`Query classification failed: ${previewText(query)}`);
      return { status: 'classification_failed' };
    }

    if (!isQueryCategory(category)) {
      this.logger.error(`Invalid query classification: ${category}`);
      return { status: 'unrecognized_category', category };
    }

    const context = this.contextResolver.resolve(category);
    const reply = await this.responseGenerator.generate(query, context);

    this.loggingService.logConciergeEvent({
      source,
      query: previewText(query),
      category,
      reply,
    });
    return { status: 'answered', category, context, reply };
  }
}
