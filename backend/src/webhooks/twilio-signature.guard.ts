import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { validateRequest } from 'twilio';

interface SignatureSettings {
  authToken: string;
  publicBaseUrl: string;
}

export const INVALID_SIGNATURE_MESSAGE = 'Error: Invalid request signature.';

/**
 * Checks `X-Twilio-Signature` when `TWILIO_VALIDATE_SIGNATURE=true`. The signed
 * URL is the public base URL Twilio was configured with plus the request path.
 */
@Injectable()
export class TwilioSignatureGuard implements CanActivate {
  private readonly settings: SignatureSettings | null;

  constructor(private readonly configService: ConfigService) {
    const enabled = this.configService.get<string>('TWILIO_VALIDATE_SIGNATURE') === 'true';
    this.settings = enabled
      ? {
          authToken: this.configService.getOrThrow<string>('TWILIO_AUTH_TOKEN'),
          publicBaseUrl: this.configService
            .getOrThrow<string>('PUBLIC_BASE_URL')
            .replace(/\/+$/, ''),
        }
      : null;
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.settings) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const signature = request.header('x-twilio-signature');
    if (!signature) {
      throw new ForbiddenException(INVALID_SIGNATURE_MESSAGE);
    }

    const url = `${this.settings.publicBaseUrl}${request.originalUrl}`;
    const params: Record<string, unknown> =
      typeof request.body === 'object' && request.body !== null ? request.body : {};

    if (!validateRequest(this.settings.authToken, signature, url, params)) {
      throw new ForbiddenException(INVALID_SIGNATURE_MESSAGE);
    }

    return true;
  }
}
