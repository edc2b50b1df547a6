import { Inject, Injectable } from '@nestjs/common';
import {
  BALANCE_ORACLE,
  type BalanceOracle,
} from '../balances/balance-oracle';
import { AuctionLedgerService } from './auction-ledger.service';
import type { Availability } from './engine';

/**
 * Commitment = sum of current bids on active auctions a participant leads.
 * Always read fresh from the ledger, paired with a fresh oracle balance.
 */
@Injectable()
export class CommitmentService {
  constructor(
    private readonly ledger: AuctionLedgerService,
    @Inject(BALANCE_ORACLE) private readonly oracle: BalanceOracle,
  ) {}

  async commitment(
    participantId: string,
    options: { excludeThreadId?: string } = {},
  ): Promise<number> {
    return this.ledger.sumCommitment(participantId, options);
  }

  /** Null when the oracle does not know the participant */
  async getAvailability(
    participantId: string,
    options: { excludeThreadId?: string } = {},
  ): Promise<Availability | null> {
    const balance = await this.oracle.getBalance(participantId);
    if (balance === null) return null;
    const committed = await this.commitment(participantId, options);
    return { balance, committed, available: balance - committed };
  }
}
