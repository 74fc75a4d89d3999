import { Body, Controller, HttpCode, InternalServerErrorException, Post } from '@nestjs/common';
import type { QueryResponse } from '@hotel-concierge/shared-types';

import { ConciergeService } from '../ai/concierge.service';
import { QueryRequestDto } from './dto/query-request.dto';

@Controller()
export class ConciergeController {
  constructor(private readonly conciergeService: ConciergeService) {}

  @Post('query')
  @HttpCode(200)
  async handleQuery(@Body() request: QueryRequestDto): Promise<QueryResponse> {
    const outcome = await this.conciergeService.answer(request.query, 'query');

    switch (outcome.status) {
      case 'answered':
        return { response: outcome.reply };
      case 'classification_failed':
        throw new InternalServerErrorException('Failed to classify your query. Please try again.');
      case 'unrecognized_category':
        throw new InternalServerErrorException('Invalid query classification');
    }
  }
}
