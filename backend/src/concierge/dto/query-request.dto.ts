import type { QueryRequest } from '@hotel-concierge/shared-types';
import { IsNotEmpty, IsString } from 'class-validator';

export class QueryRequestDto implements QueryRequest {
  @IsString({ message: 'Query parameter is required' })
  @IsNotEmpty({ message: 'Query parameter is required' })
  query!: string;
}
