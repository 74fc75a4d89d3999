import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AiModule } from '../ai/ai.module';
import { CommonModule } from '../common/common.module';
import { ConciergeModule } from '../concierge/concierge.module';
import { validateEnvironment } from '../config/environment';
import { EmailModule } from '../email/email.module';
import { LoggingModule } from '../logging/logging.module';
import { RoomsModule } from '../rooms/rooms.module';
import { WebhooksModule } from '../webhooks/webhooks.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    LoggingModule,
    CommonModule,
    RoomsModule,
    AiModule,
    ConciergeModule,
    WebhooksModule,
    EmailModule,
  ],
})
export class AppModule {}
