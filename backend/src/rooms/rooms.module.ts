import { Module } from '@nestjs/common';

import { RoomStore } from './room.store';

@Module({
  providers: [RoomStore],
  exports: [RoomStore],
})
export class RoomsModule {}
