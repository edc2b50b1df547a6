import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS auctions (
    thread_id TEXT PRIMARY KEY,
    channel_id TEXT NOT NULL,
    guild_id TEXT NOT NULL,
    player_name TEXT NOT NULL,
    current_bid INTEGER NOT NULL,
    current_bidder_id TEXT,
    current_bidder_name TEXT,
    created_at INTEGER NOT NULL,
    last_bid_at INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'active'
  );

  CREATE INDEX IF NOT EXISTS idx_auctions_status ON auctions(status);
  CREATE INDEX IF NOT EXISTS idx_auctions_channel ON auctions(channel_id, status);
  CREATE INDEX IF NOT EXISTS idx_auctions_bidder ON auctions(current_bidder_id, status);

  CREATE TABLE IF NOT EXISTS pinned_list_messages (
    channel_id TEXT PRIMARY KEY,
    message_id TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS pinned_balances_messages (
    channel_id TEXT PRIMARY KEY,
    message_id TEXT NOT NULL
  );
`;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly path: string;
  private connection: Database.Database | null = null;

  constructor(config: ConfigService) {
    this.path = config.get<string>('database.path') ?? 'data/auctions.db';
  }

  /** Open lazily so the ledger works before Nest lifecycle hooks run (tests). */
  get db(): Database.Database {
    if (!this.connection) {
      this.connection = this.open();
    }
    return this.connection;
  }

  onModuleInit(): void {
    const { name } = this.db;
    this.logger.log(`Auction ledger ready at ${name}`);
  }

  onModuleDestroy(): void {
    this.connection?.close();
    this.connection = null;
  }

  private open(): Database.Database {
    if (this.path !== ':memory:') {
      mkdirSync(dirname(this.path), { recursive: true });
    }
    const db = new Database(this.path);
    if (this.path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    return db;
  }
}
