import { Injectable, Logger } from '@nestjs/common';
import type { QueryCategory } from '@hotel-concierge/shared-types';

import { RoomStore } from '../rooms/room.store';
import { HOTEL_INFO } from './hotel.profile';

@Injectable()
export class ContextResolver {
  private readonly logger = new Logger(ContextResolver.name);

  constructor(private readonly roomStore: RoomStore) {}

  resolve(category: QueryCategory): string {
    switch (category) {
      case '1':
        this.logger.log('Resolving context from room details');
        return this.roomStore.fetchRoomDetails();
      case '2':
        this.logger.log('Resolving context from hotel information');
        return HOTEL_INFO;
    }
  }
}
