/**
 * Auction lifecycle: active → completed. No reopening.
 */
export type AuctionStatus = 'active' | 'completed';

/**
 * A participant as the chat platform identifies them.
 */
export interface Participant {
  id: string;
  name: string;
}

/**
 * One auction per thread. Timestamps are epoch seconds.
 */
export interface Auction {
  threadId: string;
  channelId: string;
  guildId: string;
  playerName: string;
  currentBid: number;
  currentBidderId: string | null;
  currentBidderName: string | null;
  createdAt: number;
  lastBidAt: number;
  status: AuctionStatus;
}

export interface CreateAuctionInput {
  threadId: string;
  channelId: string;
  guildId: string;
  playerName: string;
  amount: number;
  bidder: Participant;
}

/**
 * Adopt a thread the bot did not start; timestamps come from the caller.
 */
export interface RegisterAuctionInput {
  threadId: string;
  channelId: string;
  guildId: string;
  playerName: string;
  currentBid: number;
  bidder: Participant;
  createdAt: number;
  lastBidAt: number;
}

/**
 * What a participant can still commit: balance − committed.
 */
export interface Availability {
  balance: number;
  committed: number;
  available: number;
}

export interface AuctionSettings {
  bidExpiryHours: number;
  reminderThresholdsHours: number[];
  minBid: number;
  maxBid: number;
  currencyLabel: string;
}

export type RejectionCode =
  | 'NOT_FOUND'
  | 'NOT_ACTIVE'
  | 'WRONG_PLACEMENT'
  | 'INVALID_AMOUNT'
  | 'INVALID_INPUT'
  | 'BID_TOO_LOW'
  | 'SELF_OUTBID'
  | 'UNKNOWN_PARTICIPANT'
  | 'OVER_BUDGET'
  | 'BALANCE_UNAVAILABLE'
  | 'DUPLICATE_THREAD'
  | 'CHAT_UNAVAILABLE'
  | 'CONFLICT';

export interface Rejection {
  code: RejectionCode;
  reason: string;
}

/**
 * Result of a rule check: passes, or the first violated precondition.
 */
export type RuleCheck = { ok: true } | ({ ok: false } & Rejection);

export type CreateAuctionResult =
  | { created: true; auction: Auction }
  | ({ created: false } & Rejection);

export type StartAuctionResult =
  | { started: true; auction: Auction }
  | ({ started: false } & Rejection);

export type RegisterAuctionResult =
  | { registered: true; auction: Auction }
  | ({ registered: false } & Rejection);

export type PlaceBidResult =
  | { accepted: true; auction: Auction; previous: Auction }
  | ({ accepted: false } & Rejection);
