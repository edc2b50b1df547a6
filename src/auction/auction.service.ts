import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BALANCE_ORACLE,
  type BalanceOracle,
  type BalanceRecord,
} from '../balances/balance-oracle';
import {
  CHAT_SURFACE,
  THREAD_NAME_MAX_LENGTH,
  mentionChannel,
  mentionUser,
  type ChatSurface,
  type EmbedView,
} from '../chat/chat-surface';
import { errorMessage } from '../common/errors';
import { KeyedLock } from '../common/keyed-lock';
import { AuctionLedgerService } from './auction-ledger.service';
import { auctionEmbed, auctionStartedMessage } from './auction.presenter';
import { CommitmentService } from './commitment.service';
import { AuctionEngine, epochSeconds } from './engine';
import type {
  Auction,
  Availability,
  Participant,
  PlaceBidResult,
  RegisterAuctionResult,
  Rejection,
  RuleCheck,
  StartAuctionResult,
} from './engine';
import { PinnedSummaryService } from './pinned-summary.service';

export interface StartAuctionRequest {
  guildId: string;
  channelId: string;
  /** Whether the command was issued inside a thread */
  inThread: boolean;
  playerName: string;
  amount: number;
  starter: Participant;
}

export interface RegisterAuctionRequest {
  guildId: string;
  threadId: string;
  /** Parent channel of the thread, null when not issued in a thread */
  parentChannelId: string | null;
  inThread: boolean;
  playerName: string;
  currentBid: number;
  highBidder: Participant;
  hoursRemaining: number;
}

export interface PlaceBidRequest {
  threadId: string;
  amount: number;
  bidder: Participant;
}

export const REGISTERED_THREAD_MESSAGE =
  'This thread is now registered. The bot will track reminders, expiry, and `/bid` here.';

type AvailabilityLookup =
  | { ok: true; availability: Availability }
  | ({ ok: false } & Rejection);

/**
 * Auction state machine: start, register, bid, complete. Every transition
 * goes through the ledger, which re-checks its precondition at write time;
 * bids on one thread are additionally serialized in-process.
 */
@Injectable()
export class AuctionService {
  private readonly logger = new Logger(AuctionService.name);
  private readonly threadLocks = new KeyedLock();
  private readonly auctionChannelId: string | null;

  constructor(
    private readonly ledger: AuctionLedgerService,
    private readonly commitments: CommitmentService,
    private readonly engine: AuctionEngine,
    private readonly pinnedSummary: PinnedSummaryService,
    @Inject(BALANCE_ORACLE) private readonly oracle: BalanceOracle,
    @Inject(CHAT_SURFACE) private readonly chat: ChatSurface,
    config: ConfigService,
  ) {
    this.auctionChannelId = config.get<string>('discord.auctionChannelId') || null;
  }

  /* ------------------------------------------------------------------ */
  /*  TRANSITIONS                                                        */
  /* ------------------------------------------------------------------ */

  /** Open a thread for a player and record the starter as first bidder. */
  async startAuction(request: StartAuctionRequest): Promise<StartAuctionResult> {
    const { channelId, starter, amount } = request;
    const playerName = request.playerName.trim();

    if (request.inThread) {
      return this.rejectStart({
        code: 'WRONG_PLACEMENT',
        reason:
          "Start the auction in the main channel, not inside a thread. I'll create a thread for this player.",
      });
    }
    const placement = this.checkChannel(channelId);
    if (!placement.ok) return this.rejectStart(placement);
    if (playerName === '') {
      return this.rejectStart({
        code: 'INVALID_INPUT',
        reason: 'Player name must not be empty.',
      });
    }
    const amountCheck = this.engine.checkAmount(amount);
    if (!amountCheck.ok) return this.rejectStart(amountCheck);

    const lookup = await this.lookupAvailability(starter.id);
    if (!lookup.ok) return this.rejectStart(lookup);
    const budget = this.engine.checkBudget(amount, lookup.availability, 'start');
    if (!budget.ok) return this.rejectStart(budget);

    let threadId: string;
    try {
      const thread = await this.chat.startThread(
        channelId,
        { content: auctionStartedMessage(playerName, amount) },
        playerName.slice(0, THREAD_NAME_MAX_LENGTH),
      );
      threadId = thread.threadId;
    } catch (err) {
      this.logger.error(`Thread creation failed in ${channelId}: ${errorMessage(err)}`);
      return this.rejectStart({
        code: 'CHAT_UNAVAILABLE',
        reason: `Could not create thread: ${errorMessage(err)}`,
      });
    }

    const created = await this.ledger.createAuction({
      threadId,
      channelId,
      guildId: request.guildId,
      playerName,
      amount,
      bidder: starter,
    });
    if (!created.created) {
      this.logger.error(`Thread ${threadId} was created but could not be recorded`);
      return this.rejectStart({
        code: created.code,
        reason:
          'Thread was created but something went wrong registering the auction. Please try again or contact an admin.',
      });
    }
    const { auction } = created;
    this.logger.log(
      `Auction started: ${playerName} at ${amount} by ${starter.id} in ${threadId}`,
    );

    await this.bestEffort(`post embed in ${threadId}`, () =>
      this.chat.sendMessage(threadId, {
        embed: this.embedFor(auction, `Auction: ${playerName}`),
      }),
    );
    await this.bestEffort(`add ${starter.id} to ${threadId}`, () =>
      this.chat.addThreadMember(threadId, starter.id),
    );
    await this.bestEffort(`refresh pinned list in ${channelId}`, () =>
      this.pinnedSummary.refreshAuctions(channelId),
    );
    return { started: true, auction };
  }

  /**
   * Adopt an existing thread, back-dating the last bid so the requested
   * hours remain on the clock.
   */
  async registerAuction(
    request: RegisterAuctionRequest,
  ): Promise<RegisterAuctionResult> {
    const { threadId, parentChannelId, highBidder } = request;
    const playerName = request.playerName.trim();

    if (!request.inThread || !parentChannelId) {
      return this.rejectRegister({
        code: 'WRONG_PLACEMENT',
        reason:
          'Run `/auction register` **inside the auction thread** you want the bot to track.',
      });
    }
    if (this.auctionChannelId && parentChannelId !== this.auctionChannelId) {
      return this.rejectRegister({
        code: 'WRONG_PLACEMENT',
        reason: `This thread is not under the designated auction channel ${mentionChannel(this.auctionChannelId)}. Register only threads in that channel.`,
      });
    }
    if (playerName === '') {
      return this.rejectRegister({
        code: 'INVALID_INPUT',
        reason: 'Player name must not be empty.',
      });
    }
    const amountCheck = this.engine.checkAmount(request.currentBid);
    if (!amountCheck.ok) return this.rejectRegister(amountCheck);
    const hoursCheck = this.engine.checkHoursRemaining(request.hoursRemaining);
    if (!hoursCheck.ok) return this.rejectRegister(hoursCheck);

    const lastBidAt = this.engine.lastBidAtForRemaining(
      request.hoursRemaining,
      epochSeconds(),
    );
    const registered = await this.ledger.registerAuction({
      threadId,
      channelId: parentChannelId,
      guildId: request.guildId,
      playerName,
      currentBid: request.currentBid,
      bidder: highBidder,
      createdAt: lastBidAt,
      lastBidAt,
    });
    if (!registered.created) {
      return this.rejectRegister({
        code: registered.code,
        reason:
          'This thread is already registered as an auction. The bot is already tracking it.',
      });
    }
    const { auction } = registered;
    this.logger.log(
      `Auction registered: ${playerName} at ${auction.currentBid} (${request.hoursRemaining}h left) in ${threadId}`,
    );

    await this.bestEffort(`post embed in ${threadId}`, () =>
      this.chat.sendMessage(threadId, {
        content: REGISTERED_THREAD_MESSAGE,
        embed: this.embedFor(auction, `Auction: ${playerName} (registered)`),
      }),
    );
    await this.bestEffort(`refresh pinned list in ${parentChannelId}`, () =>
      this.pinnedSummary.refreshAuctions(parentChannelId),
    );
    return { registered: true, auction };
  }

  /**
   * Validate against the current row and a fresh availability reading,
   * then apply through the ledger's guarded update.
   */
  async placeBid(request: PlaceBidRequest): Promise<PlaceBidResult> {
    const { threadId, amount, bidder } = request;
    const result = await this.threadLocks.run<PlaceBidResult>(threadId, async () => {
      const auction = await this.ledger.getByThread(threadId);
      if (!auction) {
        return this.rejectBid({
          code: 'NOT_FOUND',
          reason:
            'This thread is not an active auction. Use `/bid` only inside a thread created by `/auction start`.',
        });
      }
      if (auction.status === 'active') {
        const placement = this.checkChannel(auction.channelId);
        if (!placement.ok) return this.rejectBid(placement);
      }
      const rules = this.engine.checkBid(auction, amount, bidder.id);
      if (!rules.ok) return this.rejectBid(rules);

      const lookup = await this.lookupAvailability(bidder.id, threadId);
      if (!lookup.ok) return this.rejectBid(lookup);
      const budget = this.engine.checkBudget(amount, lookup.availability, 'bid');
      if (!budget.ok) return this.rejectBid(budget);

      const updated = await this.ledger.placeBid(threadId, amount, bidder);
      if (!updated) {
        return this.rejectBid({
          code: 'CONFLICT',
          reason:
            'The auction changed while your bid was being checked. Look at the current bid and try again.',
        });
      }
      this.logger.log(
        `Bid accepted: ${amount} by ${bidder.id} in ${threadId} (was ${auction.currentBid})`,
      );
      return { accepted: true, auction: updated, previous: auction };
    });

    if (result.accepted) {
      const { auction } = result;
      await this.bestEffort(`announce bid in ${threadId}`, () =>
        this.chat.sendMessage(threadId, {
          content: `New bid from ${mentionUser(bidder.id)}!`,
          embed: this.embedFor(auction, `New high bid: ${amount}`),
        }),
      );
      await this.bestEffort(`add ${bidder.id} to ${threadId}`, () =>
        this.chat.addThreadMember(threadId, bidder.id),
      );
    }
    return result;
  }

  /**
   * Mark completed. Null when it was already completed or missing; with
   * `lastBidAtOrBefore`, also when a later bid reset the clock.
   */
  async completeAuction(
    threadId: string,
    options: { lastBidAtOrBefore?: number } = {},
  ): Promise<Auction | null> {
    const completed = await this.ledger.completeAuction(threadId, options);
    if (completed) {
      this.logger.log(
        `Auction completed: ${completed.playerName} to ${completed.currentBidderId ?? 'unknown'} for ${completed.currentBid}`,
      );
    }
    return completed;
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  async getAuction(threadId: string): Promise<Auction | null> {
    return this.ledger.getByThread(threadId);
  }

  async listActive(channelId?: string): Promise<Auction[]> {
    return channelId
      ? this.ledger.listActiveByChannel(channelId)
      : this.ledger.listActive();
  }

  async getAvailability(participantId: string): Promise<Availability | null> {
    return this.commitments.getAvailability(participantId);
  }

  async listBalances(): Promise<BalanceRecord[]> {
    return this.oracle.listAllBalances();
  }

  secondsUntilExpiry(auction: Auction, now: number = epochSeconds()): number {
    return this.engine.secondsUntilExpiry(auction.lastBidAt, now);
  }

  /** Commands that act on a channel may be restricted to the auction channel */
  checkChannel(channelId: string): RuleCheck {
    if (this.auctionChannelId && channelId !== this.auctionChannelId) {
      return {
        ok: false,
        code: 'WRONG_PLACEMENT',
        reason: `Auctions can only be run in ${mentionChannel(this.auctionChannelId)}.`,
      };
    }
    return { ok: true };
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private async lookupAvailability(
    participantId: string,
    excludeThreadId?: string,
  ): Promise<AvailabilityLookup> {
    let availability: Availability | null;
    try {
      availability = await this.commitments.getAvailability(participantId, {
        excludeThreadId,
      });
    } catch (err) {
      this.logger.error(
        `Balance lookup failed for ${participantId}: ${errorMessage(err)}`,
      );
      return {
        ok: false,
        code: 'BALANCE_UNAVAILABLE',
        reason: `Could not verify your ${this.engine.settings.currencyLabel} balance. Try again or contact an admin.`,
      };
    }
    if (!availability) {
      return {
        ok: false,
        code: 'UNKNOWN_PARTICIPANT',
        reason: `You're not in the ${this.engine.settings.currencyLabel} Balance sheet. Contact an admin to add you.`,
      };
    }
    return { ok: true, availability };
  }

  private embedFor(auction: Auction, title: string): EmbedView {
    return auctionEmbed(auction, {
      title,
      secondsLeft: this.secondsUntilExpiry(auction),
      expiryHours: this.engine.settings.bidExpiryHours,
    });
  }

  private async bestEffort(label: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn(`Could not ${label}: ${errorMessage(err)}`);
    }
  }

  private rejectStart(rejection: Rejection): StartAuctionResult {
    return { started: false, code: rejection.code, reason: rejection.reason };
  }

  private rejectRegister(rejection: Rejection): RegisterAuctionResult {
    return { registered: false, code: rejection.code, reason: rejection.reason };
  }

  private rejectBid(rejection: Rejection): PlaceBidResult {
    return { accepted: false, code: rejection.code, reason: rejection.reason };
  }
}
