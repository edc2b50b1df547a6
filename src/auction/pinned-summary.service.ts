import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BALANCE_ORACLE,
  type BalanceOracle,
} from '../balances/balance-oracle';
import {
  CHAT_SURFACE,
  type ChatSurface,
  type EmbedView,
} from '../chat/chat-surface';
import {
  ChatMessageNotFoundError,
  ExternalServiceError,
  errorMessage,
} from '../common/errors';
import { KeyedLock } from '../common/keyed-lock';
import {
  AuctionLedgerService,
  type PinnedSummaryKind,
} from './auction-ledger.service';
import { activeAuctionsEmbed, balancesEmbed } from './auction.presenter';
import { AuctionEngine, epochSeconds } from './engine';

/**
 * Keeps one pinned summary message per channel and kind up to date.
 *
 * Lookup order for the message to edit: in-memory id, id stored in the
 * ledger, the channel's pins (own message with the same embed title). If
 * none of those exist a new message is posted and pinned.
 */
@Injectable()
export class PinnedSummaryService {
  private readonly logger = new Logger(PinnedSummaryService.name);
  private readonly knownIds: Record<PinnedSummaryKind, Map<string, string>> = {
    auctions: new Map(),
    balances: new Map(),
  };
  private readonly lock = new KeyedLock();

  constructor(
    private readonly ledger: AuctionLedgerService,
    private readonly engine: AuctionEngine,
    @Inject(BALANCE_ORACLE) private readonly oracle: BalanceOracle,
    @Inject(CHAT_SURFACE) private readonly chat: ChatSurface,
  ) {}

  async refreshAuctions(
    channelId: string,
    now: number = epochSeconds(),
  ): Promise<EmbedView> {
    const auctions = await this.ledger.listActiveByChannel(channelId);
    const embed = activeAuctionsEmbed(
      auctions.map((auction) => ({
        auction,
        secondsLeft: this.engine.secondsUntilExpiry(auction.lastBidAt, now),
      })),
    );
    await this.upsert('auctions', channelId, embed);
    return embed;
  }

  async refreshBalances(channelId: string): Promise<EmbedView> {
    const records = await this.oracle.listAllBalances();
    const embed = balancesEmbed(records, this.engine.settings.currencyLabel);
    await this.upsert('balances', channelId, embed);
    return embed;
  }

  private async upsert(
    kind: PinnedSummaryKind,
    channelId: string,
    embed: EmbedView,
  ): Promise<string> {
    return this.lock.run(`${kind}:${channelId}`, async () => {
      const message = { embed };

      const knownId =
        this.knownIds[kind].get(channelId) ??
        (await this.ledger.getPinnedMessageId(kind, channelId));
      if (knownId) {
        try {
          await this.chat.editMessage(channelId, knownId, message);
          await this.remember(kind, channelId, knownId);
          return knownId;
        } catch (err) {
          if (!(err instanceof ChatMessageNotFoundError)) throw err;
          this.logger.log(
            `Pinned ${kind} message ${knownId} in ${channelId} is gone; looking for another`,
          );
          await this.forget(kind, channelId);
        }
      }

      const pinnedId = await this.findPinned(channelId, embed.title);
      if (pinnedId) {
        await this.chat.editMessage(channelId, pinnedId, message);
        await this.remember(kind, channelId, pinnedId);
        return pinnedId;
      }

      const createdId = await this.chat.sendMessage(channelId, message);
      await this.chat.pinMessage(channelId, createdId);
      await this.remember(kind, channelId, createdId);
      this.logger.log(`Pinned new ${kind} summary ${createdId} in ${channelId}`);
      return createdId;
    });
  }

  private async findPinned(
    channelId: string,
    title: string,
  ): Promise<string | null> {
    try {
      const pins = await this.chat.listPinnedMessages(channelId);
      const own = pins.find(
        (pin) => pin.authoredBySelf && pin.embedTitle === title,
      );
      return own?.id ?? null;
    } catch (err) {
      if (!(err instanceof ExternalServiceError)) throw err;
      this.logger.warn(`Could not read pins in ${channelId}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async remember(
    kind: PinnedSummaryKind,
    channelId: string,
    messageId: string,
  ): Promise<void> {
    if (this.knownIds[kind].get(channelId) === messageId) return;
    this.knownIds[kind].set(channelId, messageId);
    await this.ledger.setPinnedMessageId(kind, channelId, messageId);
  }

  private async forget(kind: PinnedSummaryKind, channelId: string): Promise<void> {
    this.knownIds[kind].delete(channelId);
    await this.ledger.clearPinnedMessageId(kind, channelId);
  }
}
