import {
  BadRequestException,
  Body,
  Controller,
  Header,
  HttpCode,
  Post,
  UseFilters,
  UseGuards,
} from '@nestjs/common';

import { ConciergeService } from '../ai/concierge.service';
import { LoggingService } from '../logging/logging.service';
import { buildMessagingResponse } from './twiml';
import { TwilioSignatureGuard } from './twilio-signature.guard';
import { TwimlExceptionFilter } from './twiml-exception.filter';

const WEBHOOK_EVENT = 'twilio.message';
export const MISSING_FIELDS_MESSAGE = 'Error: Phone number and message are required.';
export const UNCLASSIFIED_REPLY = 'Unable to classify your query.';

@Controller()
@UseFilters(TwimlExceptionFilter)
export class TwilioWebhookController {
  constructor(
    private readonly conciergeService: ConciergeService,
    private readonly loggingService: LoggingService,
  ) {}

  @Post('twilio_webhook')
  @HttpCode(200)
  @Header('Content-Type', 'application/xml')
  @UseGuards(TwilioSignatureGuard)
  async handleTwilioWebhook(@Body() payload: Record<string, unknown>): Promise<string> {
    this.loggingService.logWebhook(payload, WEBHOOK_EVENT);

    const phoneNumber = this.readString(payload, 'From');
    const messageBody = this.readString(payload, 'Body');

    if (!phoneNumber || !messageBody) {
      this.loggingService.logWebhookError(
        new Error('Webhook payload is missing From or Body'),
        payload,
        WEBHOOK_EVENT,
      );
      throw new BadRequestException(MISSING_FIELDS_MESSAGE);
    }

    const outcome = await this.conciergeService.answer(messageBody, 'twilio');
    const reply = outcome.status === 'answered' ? outcome.reply : UNCLASSIFIED_REPLY;

    return buildMessagingResponse(reply);
  }

  private readString(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
  }
}
