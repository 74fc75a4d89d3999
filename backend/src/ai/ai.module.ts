import { Module } from '@nestjs/common';

import { RoomsModule } from '../rooms/rooms.module';
import { ConciergeService } from './concierge.service';
import { ContextResolver } from './context.resolver';
import { llmClientProvider } from './llm.provider';
import { QueryClassifier } from './query.classifier';
import { ResponseGenerator } from './response.generator';

@Module({
  imports: [RoomsModule],
  providers: [
    llmClientProvider,
    ConciergeService,
    QueryClassifier,
    ContextResolver,
    ResponseGenerator,
  ],
  exports: [ConciergeService],
})
export class AiModule {}
