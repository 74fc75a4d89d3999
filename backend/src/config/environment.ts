import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const DEFAULT_LLM_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_LLM_MODEL = 'llama-3.3-70b-versatile';
export const DEFAULT_ROOMS_DB_PATH = 'rooms.db';
export const DEFAULT_POSTMARK_API_BASE_URL = 'https://api.postmarkapp.com';
export const DEFAULT_PORT = 8000;

export class EnvironmentVariables {
  @IsString({ message: 'GROQ_API_KEY not found in environment variables' })
  @IsNotEmpty({ message: 'GROQ_API_KEY not found in environment variables' })
  GROQ_API_KEY!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  LLM_BASE_URL?: string;

  @IsOptional()
  @IsString()
  LLM_MODEL?: string;

  @IsOptional()
  @IsString()
  ROOMS_DB_PATH?: string;

  @IsOptional()
  @IsString()
  POSTMARK_API_KEY?: string;

  @IsOptional()
  @IsString()
  SENDER_EMAIL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  POSTMARK_API_BASE_URL?: string;

  @IsOptional()
  @IsString()
  TWILIO_ACCOUNT_SID?: string;

  @IsOptional()
  @IsString()
  TWILIO_AUTH_TOKEN?: string;

  @IsOptional()
  @IsIn(['true', 'false'])
  TWILIO_VALIDATE_SIGNATURE?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  PUBLIC_BASE_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  FRONTEND_URL?: string;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;
}

/**
 * `ConfigModule` validation hook. Fails startup on a missing LLM key, and on
 * webhook signature checking switched on without the values it needs.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false, stopAtFirstError: true });

  const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));

  if (validated.TWILIO_VALIDATE_SIGNATURE === 'true') {
    if (!validated.TWILIO_AUTH_TOKEN) {
      messages.push('TWILIO_AUTH_TOKEN is required when TWILIO_VALIDATE_SIGNATURE is true');
    }
    if (!validated.PUBLIC_BASE_URL) {
      messages.push('PUBLIC_BASE_URL is required when TWILIO_VALIDATE_SIGNATURE is true');
    }
  }

  if (messages.length > 0) {
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }

  return validated;
}
