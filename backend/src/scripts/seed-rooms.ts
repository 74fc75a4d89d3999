import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsString, validateSync } from 'class-validator';
import { readFileSync } from 'fs';

import { describeError } from '../common/errors';
import { RoomsModule } from '../rooms/rooms.module';
import { RoomDetails, RoomStore } from '../rooms/room.store';

class RoomSeedEntry implements RoomDetails {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  @IsNotEmpty()
  description!: string;
}

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), RoomsModule],
})
class SeedRoomsModule {}

export function parseRoomSeed(raw: string): RoomSeedEntry[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('Room seed file must contain a JSON array');
  }

  const entries = plainToInstance(RoomSeedEntry, parsed);
  entries.forEach((entry, index) => {
    const errors = validateSync(entry);
    if (errors.length > 0) {
      const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new Error(`Invalid room at index ${index}: ${messages.join(', ')}`);
    }
  });

  return entries;
}

async function seed(filePath: string) {
  const logger = new Logger('SeedRooms');
  const rooms = parseRoomSeed(readFileSync(filePath, 'utf8'));

  const app = await NestFactory.createApplicationContext(SeedRoomsModule);
  try {
    const roomStore = app.get(RoomStore);
    rooms.forEach((room) => roomStore.upsertRoom(room));
    logger.log(`Seeded ${rooms.length} rooms; table now holds ${roomStore.countRooms()}`);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  const filePath = process.argv[2];
  if (!filePath) {
    Logger.error('Usage: seed-rooms <rooms.json>', undefined, 'SeedRooms');
    process.exit(1);
  }

  seed(filePath).catch((error: unknown) => {
    Logger.error(`Seeding failed: ${describeError(error)}`, undefined, 'SeedRooms');
    process.exit(1);
  });
}
