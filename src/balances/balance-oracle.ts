export const BALANCE_ORACLE = Symbol('BALANCE_ORACLE');

export interface BalanceRecord {
  participantId: string;
  name: string;
  balance: number;
}

/** One completed auction for the append-only history sheet */
export interface HistoryEntry {
  playerName: string;
  winnerId: string | null;
  winnerName: string | null;
  amount: number;
  completedAt: Date;
}

/**
 * Authority for participant balances. Remote and possibly slow; callers
 * never cache what it returns beyond a single decision.
 */
export interface BalanceOracle {
  /** Null when the participant is not on the balance sheet */
  getBalance(participantId: string): Promise<number | null>;
  listAllBalances(): Promise<BalanceRecord[]>;
  /** False when the participant is missing or the balance is too low */
  debit(participantId: string, amount: number): Promise<boolean>;
  appendHistory(entry: HistoryEntry): Promise<void>;
}
