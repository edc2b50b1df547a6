import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BALANCE_ORACLE,
  type BalanceOracle,
} from '../balances/balance-oracle';
import { CHAT_SURFACE, type ChatSurface } from '../chat/chat-surface';
import { SettlementDebitError, errorMessage } from '../common/errors';
import {
  debitFailureMessage,
  winnerChannelMessage,
  winnerThreadMessage,
} from './auction.presenter';
import { AuctionEngine } from './engine';
import type { Auction } from './engine';
import { PinnedSummaryService } from './pinned-summary.service';

export type SettlementStep =
  | 'announce_thread'
  | 'close_thread'
  | 'announce_channel'
  | 'append_history'
  | 'debit_winner'
  | 'refresh_summary';

export interface SettlementStepResult {
  step: SettlementStep;
  ok: boolean;
  error?: string;
}

export interface SettlementReport {
  threadId: string;
  steps: SettlementStepResult[];
  /** Operator-facing notes, one per failed step */
  warnings: string[];
  /** Set when the winner was not charged and the sheet needs a manual fix */
  debitFailure: SettlementDebitError | null;
}

/**
 * Side effects of a completed auction. Runs once per completion, after the
 * ledger has already flipped the row. Each step is isolated: a failure is
 * logged and recorded, and the next step still runs.
 */
@Injectable()
export class SettlementService {
  private readonly logger = new Logger(SettlementService.name);

  constructor(
    private readonly engine: AuctionEngine,
    private readonly pinnedSummary: PinnedSummaryService,
    @Inject(BALANCE_ORACLE) private readonly oracle: BalanceOracle,
    @Inject(CHAT_SURFACE) private readonly chat: ChatSurface,
  ) {}

  async settle(
    auction: Auction,
    completedAt: Date = new Date(),
  ): Promise<SettlementReport> {
    const report: SettlementReport = {
      threadId: auction.threadId,
      steps: [],
      warnings: [],
      debitFailure: null,
    };
    const run = async (step: SettlementStep, fn: () => Promise<unknown>) => {
      try {
        await fn();
        report.steps.push({ step, ok: true });
      } catch (err) {
        const message = errorMessage(err);
        report.steps.push({ step, ok: false, error: message });
        report.warnings.push(`${step} failed for ${auction.threadId}: ${message}`);
        this.logger.warn(`Settlement ${step} failed for ${auction.threadId}: ${message}`);
        if (err instanceof SettlementDebitError) report.debitFailure = err;
      }
    };

    await run('announce_thread', () =>
      this.chat.sendMessage(auction.threadId, {
        content: winnerThreadMessage(auction),
      }),
    );
    await run('close_thread', () => this.chat.closeThread(auction.threadId));
    await run('announce_channel', () =>
      this.chat.sendMessage(auction.channelId, {
        content: winnerChannelMessage(auction),
      }),
    );
    await run('append_history', () =>
      this.oracle.appendHistory({
        playerName: auction.playerName,
        winnerId: auction.currentBidderId,
        winnerName: auction.currentBidderName,
        amount: auction.currentBid,
        completedAt,
      }),
    );
    await run('debit_winner', () => this.debitWinner(auction));
    await run('refresh_summary', () =>
      this.pinnedSummary.refreshAuctions(auction.channelId),
    );

    if (report.debitFailure) await this.alertOperators(auction, report.debitFailure);
    this.logger.log(
      `Settled ${auction.threadId}: ${report.steps.filter((s) => s.ok).length}/${report.steps.length} steps ok`,
    );
    return report;
  }

  private async debitWinner(auction: Auction): Promise<void> {
    const winnerId = auction.currentBidderId;
    if (!winnerId) {
      throw new SettlementDebitError(
        auction.threadId,
        null,
        auction.currentBid,
        'Winner is unknown',
      );
    }
    let debited: boolean;
    try {
      debited = await this.oracle.debit(winnerId, auction.currentBid);
    } catch (err) {
      throw new SettlementDebitError(
        auction.threadId,
        winnerId,
        auction.currentBid,
        `Balance sheet unavailable: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (!debited) {
      throw new SettlementDebitError(
        auction.threadId,
        winnerId,
        auction.currentBid,
        'Participant missing from the balance sheet or balance too low',
      );
    }
  }

  private async alertOperators(
    auction: Auction,
    failure: SettlementDebitError,
  ): Promise<void> {
    this.logger.error(
      `Could not debit ${failure.amount} from ${failure.participantId ?? 'unknown winner'} for ${auction.threadId}: ${failure.message}`,
    );
    try {
      await this.chat.sendMessage(auction.channelId, {
        content: debitFailureMessage(auction, this.engine.settings.currencyLabel),
      });
    } catch (err) {
      this.logger.warn(
        `Could not post debit failure notice in ${auction.channelId}: ${errorMessage(err)}`,
      );
    }
  }
}
