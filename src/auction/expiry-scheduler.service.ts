import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CHAT_SURFACE, type ChatSurface } from '../chat/chat-surface';
import { errorMessage } from '../common/errors';
import { AuctionService } from './auction.service';
import { auctionEmbed, reminderMessage } from './auction.presenter';
import { loadSweepIntervals, type SweepIntervals } from './auction.settings';
import { AuctionEngine, epochSeconds } from './engine';
import { SettlementService } from './settlement.service';

export const DISPLAY_SCAN_LIMIT = 20;

type SweepName = 'reminders' | 'completions' | 'displays';

const INTERVAL_NAMES: Record<SweepName, string> = {
  reminders: 'auction-reminders',
  completions: 'auction-completions',
  displays: 'auction-displays',
};

/** Reminders are tracked per bid-epoch: a new bid starts a fresh set. */
function reminderKey(threadId: string, lastBidAt: number): string {
  return `${threadId}:${lastBidAt}`;
}

/**
 * Periodic sweeps over active auctions: reminders before expiry,
 * completion and settlement at expiry, and refreshing each thread's
 * time-left card. Sweeps are skipped while the chat client is offline.
 */
@Injectable()
export class ExpirySchedulerService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(ExpirySchedulerService.name);
  private readonly remindersSent = new Map<string, Set<number>>();
  private readonly intervals: SweepIntervals;

  constructor(
    private readonly auctions: AuctionService,
    private readonly settlement: SettlementService,
    private readonly engine: AuctionEngine,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(CHAT_SURFACE) private readonly chat: ChatSurface,
    config: ConfigService,
  ) {
    this.intervals = loadSweepIntervals(config);
  }

  onApplicationBootstrap(): void {
    this.schedule('reminders', this.intervals.reminderIntervalSec, () =>
      this.sweepReminders(),
    );
    this.schedule('completions', this.intervals.completionIntervalSec, () =>
      this.sweepCompletions(),
    );
    this.schedule('displays', this.intervals.displayIntervalSec, () =>
      this.refreshDisplays(),
    );
  }

  onApplicationShutdown(): void {
    for (const name of Object.values(INTERVAL_NAMES)) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
    }
  }

  /* ------------------------------------------------------------------ */
  /*  SWEEPS                                                             */
  /* ------------------------------------------------------------------ */

  /** Returns the number of reminders posted. */
  async sweepReminders(now: number = epochSeconds()): Promise<number> {
    const active = await this.auctions.listActive();
    let posted = 0;

    for (const auction of active) {
      const key = reminderKey(auction.threadId, auction.lastBidAt);
      let sent = this.remindersSent.get(key);
      if (!sent) {
        sent = new Set();
        this.remindersSent.set(key, sent);
      }
      for (const threshold of this.engine.dueReminders(auction.lastBidAt, now, sent)) {
        // claimed before the send so an overlapping sweep skips it
        sent.add(threshold);
        try {
          await this.chat.sendMessage(auction.threadId, {
            content: reminderMessage(
              auction.playerName,
              threshold,
              this.engine.settings.bidExpiryHours,
            ),
          });
          posted++;
          this.logger.log(`Sent ${threshold}h reminder in ${auction.threadId}`);
        } catch (err) {
          sent.delete(threshold);
          this.logger.warn(
            `Reminder ${threshold}h failed in ${auction.threadId}: ${errorMessage(err)}`,
          );
        }
      }
    }

    // re-read: overlapping sweeps may have claimed epochs this one never saw
    const live = new Set(
      (await this.auctions.listActive()).map((a) =>
        reminderKey(a.threadId, a.lastBidAt),
      ),
    );
    for (const key of this.remindersSent.keys()) {
      if (!live.has(key)) this.remindersSent.delete(key);
    }
    return posted;
  }

  /** Returns the number of auctions completed by this sweep. */
  async sweepCompletions(now: number = epochSeconds()): Promise<number> {
    const active = await this.auctions.listActive();
    const cutoff = now - this.engine.expirySeconds;
    let completed = 0;

    for (const auction of active) {
      if (!this.engine.isExpired(auction.lastBidAt, now)) continue;
      try {
        const closed = await this.auctions.completeAuction(auction.threadId, {
          lastBidAtOrBefore: cutoff,
        });
        if (!closed) {
          this.logger.debug(`${auction.threadId} was closed or bid on meanwhile`);
          continue;
        }
        completed++;
        await this.settlement.settle(closed);
      } catch (err) {
        this.logger.error(
          `Completion failed for ${auction.threadId}: ${errorMessage(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
      }
    }
    return completed;
  }

  /** Returns the number of thread cards updated. */
  async refreshDisplays(now: number = epochSeconds()): Promise<number> {
    const active = await this.auctions.listActive();
    let updated = 0;

    for (const auction of active) {
      try {
        const messageId = await this.chat.findLatestOwnEmbedMessage(
          auction.threadId,
          DISPLAY_SCAN_LIMIT,
        );
        if (!messageId) continue;
        await this.chat.editMessage(auction.threadId, messageId, {
          embed: auctionEmbed(auction, {
            title: 'Current bid',
            secondsLeft: this.engine.secondsUntilExpiry(auction.lastBidAt, now),
            expiryHours: this.engine.settings.bidExpiryHours,
          }),
        });
        updated++;
      } catch (err) {
        this.logger.warn(
          `Display refresh failed for ${auction.threadId}: ${errorMessage(err)}`,
        );
      }
    }
    return updated;
  }

  /* ------------------------------------------------------------------ */
  /*  SCHEDULING                                                         */
  /* ------------------------------------------------------------------ */

  private schedule(
    sweep: SweepName,
    everySec: number,
    fn: () => Promise<number>,
  ): void {
    const handle = setInterval(() => {
      void this.runSweep(sweep, fn);
    }, everySec * 1000);
    this.schedulerRegistry.addInterval(INTERVAL_NAMES[sweep], handle);
    this.logger.log(`Scheduled ${sweep} sweep every ${everySec}s`);
  }

  /** Never rejects; a failed sweep is logged and retried on the next tick. */
  async runSweep(sweep: SweepName, fn: () => Promise<number>): Promise<void> {
    if (!this.chat.isReady()) {
      this.logger.debug(`Chat offline; skipping ${sweep} sweep`);
      return;
    }
    try {
      const count = await fn();
      if (count > 0) this.logger.log(`${sweep} sweep: ${count}`);
    } catch (err) {
      this.logger.error(
        `${sweep} sweep failed: ${errorMessage(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
    }
  }
}
