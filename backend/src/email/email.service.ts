import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { SendEmailResult } from '@hotel-concierge/shared-types';
import axios, { AxiosInstance } from 'axios';

import { describeError } from '../common/errors';
import { DEFAULT_POSTMARK_API_BASE_URL } from '../config/environment';
import { LoggingService } from '../logging/logging.service';

interface PostmarkEmail {
  From: string;
  To: string;
  Subject: string;
  TextBody: string;
}

/** Relays plain-text mail through the Postmark `/email` endpoint. */
@Injectable()
export class EmailService {
  private readonly api: AxiosInstance;
  private readonly logger = new Logger(EmailService.name);
  private readonly serverToken?: string;
  private readonly senderEmail?: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly loggingService: LoggingService,
  ) {
    this.serverToken = this.configService.get<string>('POSTMARK_API_KEY');
    this.senderEmail = this.configService.get<string>('SENDER_EMAIL');

    this.api = axios.create({
      baseURL:
        this.configService.get<string>('POSTMARK_API_BASE_URL') ?? DEFAULT_POSTMARK_API_BASE_URL,
      timeout: 30000,
      // Any upstream status becomes a result, not an exception
      validateStatus: () => true,
    });
  }

  async sendEmail(to: string, subject: string, body: string): Promise<SendEmailResult> {
    if (!this.serverToken || !this.senderEmail) {
      this.logger.warn('POSTMARK_API_KEY or SENDER_EMAIL is not configured; email not sent.');
      return this.record(to, subject, {
        success: false,
        error: 'Email delivery is not configured',
      });
    }

    const payload: PostmarkEmail = {
      From: this.senderEmail,
      To: to,
      Subject: subject,
      TextBody: body,
    };

    try {
      const response = await this.api.post<unknown>('/email', payload, {
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'X-Postmark-Server-Token': this.serverToken,
        },
      });

      if (response.status === 200) {
        this.logger.log(`Email sent to ${to}`);
        return this.record(to, subject, { success: true, message: 'Email sent successfully' });
      }

      const error =
        typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
      this.logger.warn(`Postmark rejected email to ${to} with status ${response.status}`);
      return this.record(to, subject, { success: false, error });
    } catch (error) {
      this.logger.error(`Failed to send email to ${to}: ${describeError(error)}`);
      return this.record(to, subject, { success: false, error: describeError(error) });
    }
  }

  private record(to: string, subject: string, result: SendEmailResult): SendEmailResult {
    this.loggingService.logEmailDelivery({
      recipient: to,
      subject,
      success: result.success,
      error: result.success ? undefined : result.error,
    });
    return result;
  }
}
