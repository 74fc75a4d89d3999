import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

import { readExceptionMessage } from '../common/filters/http-exception.filter';
import { buildMessagingResponse } from './twiml';

/** Twilio expects TwiML back even for rejected requests, so errors never become JSON here. */
@Catch()
export class TwimlExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(TwimlExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Error: Unable to process your message.';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = readExceptionMessage(exception);
    }

    const logMessage = `${request.method} ${request.url} - ${status} - ${message}`;
    if (status >= 500) {
      this.logger.error(logMessage, exception instanceof Error ? exception.stack : exception);
    } else {
      this.logger.warn(logMessage);
    }

    response.status(status).type('application/xml').send(buildMessagingResponse(message));
  }
}
