import type {
  Auction,
  AuctionSettings,
  Availability,
  RuleCheck,
} from './types';

const SECONDS_PER_HOUR = 3600;
const REMINDER_WINDOW_HOURS = 0.5;

export const DEFAULT_AUCTION_SETTINGS: AuctionSettings = {
  bidExpiryHours: 24,
  reminderThresholdsHours: [6, 1],
  minBid: 1,
  maxBid: 1_000_000,
  currencyLabel: 'POM',
};

export function epochSeconds(ms: number = Date.now()): number {
  return Math.floor(ms / 1000);
}

/**
 * Pure auction rules: deterministic, no I/O. Every time-dependent method
 * takes `now` (epoch seconds) so callers decide which clock reading a
 * decision is made against.
 */
export class AuctionEngine {
  constructor(
    readonly settings: AuctionSettings = DEFAULT_AUCTION_SETTINGS,
  ) {}

  get expirySeconds(): number {
    return this.settings.bidExpiryHours * SECONDS_PER_HOUR;
  }

  /**
   * max(0, lastBidAt + expiry − now)
   */
  secondsUntilExpiry(lastBidAt: number, now: number): number {
    return Math.max(0, lastBidAt + this.expirySeconds - now);
  }

  isExpired(lastBidAt: number, now: number): boolean {
    return this.secondsUntilExpiry(lastBidAt, now) === 0;
  }

  /**
   * Thresholds whose window (h − 0.5h, h] contains the time left and that
   * have not been announced for this bid-epoch yet.
   */
  dueReminders(
    lastBidAt: number,
    now: number,
    alreadySent: ReadonlySet<number>,
  ): number[] {
    const hoursLeft = this.secondsUntilExpiry(lastBidAt, now) / SECONDS_PER_HOUR;
    return this.settings.reminderThresholdsHours.filter((threshold) => {
      if (alreadySent.has(threshold)) return false;
      const lower = threshold - REMINDER_WINDOW_HOURS;
      return lower < hoursLeft && hoursLeft <= threshold;
    });
  }

  /**
   * Whole currency within the configured bounds.
   */
  checkAmount(amount: number): RuleCheck {
    const { minBid, maxBid } = this.settings;
    if (!Number.isInteger(amount) || amount < minBid || amount > maxBid) {
      return {
        ok: false,
        code: 'INVALID_AMOUNT',
        reason: `Amount must be a whole number between ${minBid} and ${maxBid}.`,
      };
    }
    return { ok: true };
  }

  /**
   * Bid preconditions that depend only on the auction row.
   */
  checkBid(auction: Auction, amount: number, bidderId: string): RuleCheck {
    if (auction.status !== 'active') {
      return {
        ok: false,
        code: 'NOT_ACTIVE',
        reason: `This auction is completed and was won by ${auction.currentBidderName ?? 'Unknown'} for ${auction.currentBid}.`,
      };
    }
    const amountCheck = this.checkAmount(amount);
    if (!amountCheck.ok) return amountCheck;
    if (amount <= auction.currentBid) {
      return {
        ok: false,
        code: 'BID_TOO_LOW',
        reason: `Your bid **${amount}** must be **higher** than the current bid of **${auction.currentBid}**.`,
      };
    }
    if (auction.currentBidderId === bidderId) {
      return {
        ok: false,
        code: 'SELF_OUTBID',
        reason: "You can't raise your own bid. Wait for someone else to outbid you.",
      };
    }
    return { ok: true };
  }

  /**
   * Reservation ceiling: the amount may not exceed balance − committed.
   */
  checkBudget(
    amount: number,
    availability: Availability,
    action: 'start' | 'bid',
  ): RuleCheck {
    if (amount <= availability.available) return { ok: true };
    const { balance, committed, available } = availability;
    const label = this.settings.currencyLabel;
    return {
      ok: false,
      code: 'OVER_BUDGET',
      reason:
        action === 'start'
          ? `You don't have enough ${label} to start at ${amount}. Available: **${available}**. (balance: ${balance}, committed: ${committed})`
          : `You don't have enough ${label}. Available: **${available}** (balance: ${balance}, committed to other bids: ${committed}).`,
    };
  }

  checkHoursRemaining(hoursRemaining: number): RuleCheck {
    const max = this.settings.bidExpiryHours;
    if (!Number.isFinite(hoursRemaining) || hoursRemaining < 0 || hoursRemaining > max) {
      return {
        ok: false,
        code: 'INVALID_INPUT',
        reason: `Hours remaining must be between 0 and ${max}.`,
      };
    }
    return { ok: true };
  }

  /**
   * The last-bid time that leaves `hoursRemaining` on the clock at `now`.
   */
  lastBidAtForRemaining(hoursRemaining: number, now: number): number {
    return now + Math.trunc((hoursRemaining - this.settings.bidExpiryHours) * SECONDS_PER_HOUR);
  }
}
