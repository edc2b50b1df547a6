import { Injectable, Logger } from '@nestjs/common';
import type Database from 'better-sqlite3';
import { DatabaseService } from '../database/database.service';
import { epochSeconds } from './engine';
import type {
  Auction,
  CreateAuctionInput,
  CreateAuctionResult,
  Participant,
  RegisterAuctionInput,
} from './engine';

/** Raw `auctions` row as SQLite returns it */
interface AuctionRow {
  thread_id: string;
  channel_id: string;
  guild_id: string;
  player_name: string;
  current_bid: number;
  current_bidder_id: string | null;
  current_bidder_name: string | null;
  created_at: number;
  last_bid_at: number;
  status: string;
}

type InsertParams = [
  string,
  string,
  string,
  string,
  number,
  string | null,
  string | null,
  number,
  number,
];

export type PinnedSummaryKind = 'auctions' | 'balances';

const PINNED_TABLES: Record<PinnedSummaryKind, string> = {
  auctions: 'pinned_list_messages',
  balances: 'pinned_balances_messages',
};

const AUCTION_COLUMNS = `
  thread_id, channel_id, guild_id, player_name,
  current_bid, current_bidder_id, current_bidder_name,
  created_at, last_bid_at, status
`;

const INSERT_AUCTION = `
  INSERT OR IGNORE INTO auctions (${AUCTION_COLUMNS})
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'active')
`;

/**
 * Durable auction ledger. Sole writer of auction rows; every write that
 * depends on the current row re-checks its precondition in the WHERE clause.
 */
@Injectable()
export class AuctionLedgerService {
  private readonly logger = new Logger(AuctionLedgerService.name);

  constructor(private readonly database: DatabaseService) {}

  private get db(): Database.Database {
    return this.database.db;
  }

  /* ------------------------------------------------------------------ */
  /*  WRITES                                                             */
  /* ------------------------------------------------------------------ */

  /** Open a new auction; the opening bid is the current bid. */
  async createAuction(
    input: CreateAuctionInput,
    now: number = epochSeconds(),
  ): Promise<CreateAuctionResult> {
    return this.insert([
      input.threadId,
      input.channelId,
      input.guildId,
      input.playerName,
      input.amount,
      input.bidder.id,
      input.bidder.name,
      now,
      now,
    ]);
  }

  /** Adopt an auction thread the bot did not start, keeping its clock. */
  async registerAuction(
    input: RegisterAuctionInput,
  ): Promise<CreateAuctionResult> {
    return this.insert([
      input.threadId,
      input.channelId,
      input.guildId,
      input.playerName,
      input.currentBid,
      input.bidder.id,
      input.bidder.name,
      input.createdAt,
      input.lastBidAt,
    ]);
  }

  /**
   * Apply a bid. Returns the updated auction, or null when the row is
   * missing, no longer active, already at or above `amount`, or led by the
   * same bidder at write time.
   */
  async placeBid(
    threadId: string,
    amount: number,
    bidder: Participant,
    now: number = epochSeconds(),
  ): Promise<Auction | null> {
    const update = this.db.prepare<
      [number, string, string, number, string, number, string]
    >(`
      UPDATE auctions
      SET current_bid = ?, current_bidder_id = ?, current_bidder_name = ?, last_bid_at = ?
      WHERE thread_id = ?
        AND status = 'active'
        AND current_bid < ?
        AND (current_bidder_id IS NULL OR current_bidder_id <> ?)
    `);
    const apply = this.db.transaction((): AuctionRow | null => {
      const info = update.run(
        amount,
        bidder.id,
        bidder.name,
        now,
        threadId,
        amount,
        bidder.id,
      );
      if (info.changes === 0) return null;
      return this.selectRow(threadId);
    });
    const row = apply();
    return row ? this.toAuction(row) : null;
  }

  /**
   * Flip active → completed. Null when the auction is missing, another
   * caller already completed it, or (with `lastBidAtOrBefore`) a bid landed
   * after the cutoff, so only one caller ever settles an expired row.
   */
  async completeAuction(
    threadId: string,
    options: { lastBidAtOrBefore?: number } = {},
  ): Promise<Auction | null> {
    const cutoff = options.lastBidAtOrBefore ?? null;
    const update = this.db.prepare<[string, number | null, number | null]>(`
      UPDATE auctions SET status = 'completed'
      WHERE thread_id = ? AND status = 'active'
        AND (? IS NULL OR last_bid_at <= ?)
    `);
    const apply = this.db.transaction((): AuctionRow | null => {
      const info = update.run(threadId, cutoff, cutoff);
      if (info.changes === 0) return null;
      return this.selectRow(threadId);
    });
    const row = apply();
    return row ? this.toAuction(row) : null;
  }

  async setPinnedMessageId(
    kind: PinnedSummaryKind,
    channelId: string,
    messageId: string,
  ): Promise<void> {
    this.db
      .prepare<[string, string]>(
        `INSERT INTO ${PINNED_TABLES[kind]} (channel_id, message_id) VALUES (?, ?)
         ON CONFLICT(channel_id) DO UPDATE SET message_id = excluded.message_id`,
      )
      .run(channelId, messageId);
  }

  async clearPinnedMessageId(
    kind: PinnedSummaryKind,
    channelId: string,
  ): Promise<void> {
    this.db
      .prepare<[string]>(`DELETE FROM ${PINNED_TABLES[kind]} WHERE channel_id = ?`)
      .run(channelId);
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  async getByThread(threadId: string): Promise<Auction | null> {
    const row = this.selectRow(threadId);
    return row ? this.toAuction(row) : null;
  }

  async listActive(): Promise<Auction[]> {
    const rows = this.db
      .prepare<[], AuctionRow>(
        `SELECT ${AUCTION_COLUMNS} FROM auctions WHERE status = 'active' ORDER BY created_at ASC`,
      )
      .all();
    return rows.map((row) => this.toAuction(row));
  }

  /** Active auctions in one channel, newest first */
  async listActiveByChannel(channelId: string): Promise<Auction[]> {
    const rows = this.db
      .prepare<[string], AuctionRow>(
        `SELECT ${AUCTION_COLUMNS} FROM auctions
         WHERE channel_id = ? AND status = 'active'
         ORDER BY created_at DESC`,
      )
      .all(channelId);
    return rows.map((row) => this.toAuction(row));
  }

  /**
   * Sum of current bids on active auctions the participant leads.
   * Recomputed on every call.
   */
  async sumCommitment(
    participantId: string,
    options: { excludeThreadId?: string } = {},
  ): Promise<number> {
    const row = this.db
      .prepare<[string, string], { total: number }>(
        `SELECT COALESCE(SUM(current_bid), 0) AS total FROM auctions
         WHERE status = 'active' AND current_bidder_id = ? AND thread_id <> ?`,
      )
      .get(participantId, options.excludeThreadId ?? '');
    return row?.total ?? 0;
  }

  async getPinnedMessageId(
    kind: PinnedSummaryKind,
    channelId: string,
  ): Promise<string | null> {
    const row = this.db
      .prepare<[string], { message_id: string }>(
        `SELECT message_id FROM ${PINNED_TABLES[kind]} WHERE channel_id = ?`,
      )
      .get(channelId);
    return row?.message_id ?? null;
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private insert(params: InsertParams): CreateAuctionResult {
    const [threadId] = params;
    const info = this.db.prepare<InsertParams>(INSERT_AUCTION).run(...params);
    if (info.changes === 0) {
      this.logger.warn(`Thread ${threadId} already has an auction`);
      return {
        created: false,
        code: 'DUPLICATE_THREAD',
        reason: 'This thread is already registered as an auction.',
      };
    }
    const row = this.selectRow(threadId);
    if (!row) {
      throw new Error(`Auction ${threadId} vanished right after insert`);
    }
    return { created: true, auction: this.toAuction(row) };
  }

  private selectRow(threadId: string): AuctionRow | null {
    return (
      this.db
        .prepare<[string], AuctionRow>(
          `SELECT ${AUCTION_COLUMNS} FROM auctions WHERE thread_id = ?`,
        )
        .get(threadId) ?? null
    );
  }

  private toAuction(row: AuctionRow): Auction {
    return {
      threadId: row.thread_id,
      channelId: row.channel_id,
      guildId: row.guild_id,
      playerName: row.player_name,
      currentBid: row.current_bid,
      currentBidderId: row.current_bidder_id,
      currentBidderName: row.current_bidder_name,
      createdAt: row.created_at,
      lastBidAt: row.last_bid_at,
      status: row.status === 'completed' ? 'completed' : 'active',
    };
  }
}
