import { Module } from '@nestjs/common';

import { AiModule } from '../ai/ai.module';
import { TwilioWebhookController } from './twilio.webhook.controller';

@Module({
  imports: [AiModule],
  controllers: [TwilioWebhookController],
})
export class WebhooksModule {}
