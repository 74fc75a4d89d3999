import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import type { RoomRecord } from '@hotel-concierge/shared-types';

import { describeError } from '../common/errors';
import { DEFAULT_ROOMS_DB_PATH } from '../config/environment';

export type RoomDetails = Pick<RoomRecord, 'title' | 'description'>;

export const NO_ROOM_DETAILS = 'No room details available.';
export const ROOM_DB_CONNECTION_ERROR =
  'Unable to fetch room details due to database connection error.';

const CREATE_ROOM_TABLE = `
  CREATE TABLE IF NOT EXISTS room_data (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT UNIQUE,
    description TEXT
  )
`;

export const formatRoomDetails = (rooms: RoomDetails[]): string =>
  rooms.map((room) => `Room: ${room.title}\nDescription: ${room.description}`).join('\n\n');

/**
 * File-backed `room_data` table. Every call opens its own connection and closes
 * it before returning, so requests never share a handle.
 */
@Injectable()
export class RoomStore implements OnModuleInit {
  private readonly logger = new Logger(RoomStore.name);
  private readonly databasePath: string;

  constructor(private readonly configService: ConfigService) {
    this.databasePath =
      this.configService.get<string>('ROOMS_DB_PATH') ?? DEFAULT_ROOMS_DB_PATH;
  }

  onModuleInit(): void {
    this.initialize();
  }

  initialize(): void {
    this.logger.log(`Initializing room database at ${this.databasePath}...`);

    try {
      this.withDatabase({}, (db) => {
        db.exec(CREATE_ROOM_TABLE);
      });
      this.logger.log(`Current number of room descriptions in database: ${this.countRooms()}`);
    } catch (error) {
      this.logger.error(`Database initialization error: ${describeError(error)}`);
      throw error;
    }
  }

  countRooms(): number {
    return this.withDatabase({ readonly: true, fileMustExist: true }, (db) => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM room_data').get();
      return row?.count ?? 0;
    });
  }

  fetchRoomDetails(): string {
    this.logger.log('Fetching room details...');

    let db: Database.Database;
    try {
      db = new Database(this.databasePath, { readonly: true, fileMustExist: true });
    } catch (error) {
      this.logger.error(`Database connection error: ${describeError(error)}`);
      return ROOM_DB_CONNECTION_ERROR;
    }

    try {
      const rooms = db
        .prepare<[], RoomDetails>('SELECT title, description FROM room_data ORDER BY id')
        .all();

      if (rooms.length === 0) {
        this.logger.warn('No room details found in database');
        return NO_ROOM_DETAILS;
      }

      this.logger.log(`Retrieved ${rooms.length} room descriptions`);
      return formatRoomDetails(rooms);
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error fetching room details: ${message}`);
      return `Error fetching room details: ${message}`;
    } finally {
      db.close();
      this.logger.debug('Database connection closed');
    }
  }

  upsertRoom(room: RoomDetails): void {
    this.withDatabase({}, (db) => {
      db.prepare<RoomDetails>(
        `INSERT INTO room_data (title, description) VALUES (@title, @description)
         ON CONFLICT(title) DO UPDATE SET description = excluded.description`,
      ).run(room);
    });
  }

  private withDatabase<T>(options: Database.Options, operation: (db: Database.Database) => T): T {
    const db = new Database(this.databasePath, options);
    try {
      return operation(db);
    } finally {
      db.close();
    }
  }
}
