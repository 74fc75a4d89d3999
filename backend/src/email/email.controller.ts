import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import type { SendEmailResult } from '@hotel-concierge/shared-types';

import { HOTEL_NAME } from '../ai/hotel.profile';
import { SendEmailDto } from './dto/send-email.dto';
import { EmailService } from './email.service';

export const DEFAULT_EMAIL_SUBJECT = `Room Availability at ${HOTEL_NAME}`;
export const DEFAULT_EMAIL_BODY = 'Here are the details of the available rooms.';

@Controller()
export class EmailController {
  constructor(private readonly emailService: EmailService) {}

  @Post('send_email')
  @HttpCode(200)
  handleSendEmail(@Body() request: SendEmailDto): Promise<SendEmailResult> {
    return this.emailService.sendEmail(
      request.email,
      request.subject ?? DEFAULT_EMAIL_SUBJECT,
      request.body ?? DEFAULT_EMAIL_BODY,
    );
  }
}
