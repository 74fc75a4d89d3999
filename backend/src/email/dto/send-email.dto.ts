import type { SendEmailRequest } from '@hotel-concierge/shared-types';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class SendEmailDto implements SendEmailRequest {
  @IsString({ message: 'Email is required' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsOptional()
  @IsString()
  subject?: string;

  @IsOptional()
  @IsString()
  body?: string;
}
