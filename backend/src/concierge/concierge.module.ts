import { Module } from '@nestjs/common';

import { AiModule } from '../ai/ai.module';
import { ConciergeController } from './concierge.controller';

@Module({
  imports: [AiModule],
  controllers: [ConciergeController],
})
export class ConciergeModule {}
