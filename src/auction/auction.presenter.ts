import type { BalanceRecord } from '../balances/balance-oracle';
import {
  mentionChannel,
  mentionUser,
  type EmbedView,
} from '../chat/chat-surface';
import type { Auction, Participant } from './engine';

export const COLORS = {
  green: 0x2ecc71,
  gold: 0xf1c40f,
  red: 0xe74c3c,
  blue: 0x3498db,
} as const;

export const ACTIVE_AUCTIONS_TITLE = '📌 Active Auctions';
export const FIELD_VALUE_LIMIT = 1024;
export const MEMBER_LIST_LIMIT = 50;

export function balancesTitle(currencyLabel: string): string {
  return `📌 ${currencyLabel} Balances`;
}

/** `Xh Ym`, `Ym` or `Expired` */
export function formatTimeLeft(seconds: number): string {
  if (seconds <= 0) return 'Expired';
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return h > 0 ? `${h}h ${m}m` : `${m}m`;
}

/** Green 12h+, gold 3–12h, red under 3h */
export function colorForTimeLeft(seconds: number): number {
  const hours = seconds / 3600;
  if (hours >= 12) return COLORS.green;
  if (hours >= 3) return COLORS.gold;
  return COLORS.red;
}

/**
 * Join lines into one field value, dropping whole lines past the platform
 * limit and saying how many were left out.
 */
export function joinFieldLines(
  lines: string[],
  limit: number = FIELD_VALUE_LIMIT,
): string {
  const kept: string[] = [];
  let length = 0;
  for (const [index, line] of lines.entries()) {
    const remaining = lines.length - index;
    const suffix = `…and ${remaining} more`;
    const next = length + (kept.length > 0 ? 1 : 0) + line.length;
    const reserve = remaining > 1 ? suffix.length + 1 : 0;
    if (next + reserve > limit) {
      kept.push(suffix);
      return kept.join('\n');
    }
    kept.push(line);
    length = next;
  }
  return kept.join('\n');
}

export function auctionEmbed(
  auction: Auction,
  options: { title: string; secondsLeft: number; expiryHours: number },
): EmbedView {
  return {
    title: options.title,
    description: `**${auction.playerName}**`,
    color: colorForTimeLeft(options.secondsLeft),
    fields: [
      { name: 'Current bid', value: `**${auction.currentBid}**`, inline: true },
      {
        name: 'High bidder',
        value: auction.currentBidderName || '—',
        inline: true,
      },
      {
        name: 'Time left',
        value: formatTimeLeft(options.secondsLeft),
        inline: true,
      },
    ],
    footer: `Bid with /bid <amount> • ${options.expiryHours}h with no new bid wins`,
  };
}

export function activeAuctionsEmbed(
  entries: Array<{ auction: Auction; secondsLeft: number }>,
): EmbedView {
  const embed: EmbedView = {
    title: ACTIVE_AUCTIONS_TITLE,
    description: 'Click a link to open the thread and bid with `/bid <amount>`.',
    color: COLORS.blue,
    fields: [],
  };
  if (entries.length === 0) {
    embed.fields.push({
      name: '—',
      value: 'No active auctions in this channel.',
    });
    return embed;
  }
  const lines = entries.map(
    ({ auction, secondsLeft }) =>
      `• ${mentionChannel(auction.threadId)} (bid: **${auction.currentBid}** by ${auction.currentBidderName ?? 'Unknown'}) ${formatTimeLeft(secondsLeft)} left`,
  );
  embed.fields.push({ name: 'Prospects', value: joinFieldLines(lines) });
  embed.footer =
    'Use /auctions to refresh this list • For a new auction: /auction start';
  return embed;
}

export function balancesEmbed(
  records: BalanceRecord[],
  currencyLabel: string,
): EmbedView {
  const embed: EmbedView = {
    title: balancesTitle(currencyLabel),
    description: `From ${currencyLabel} Balance sheet (source of truth)`,
    color: COLORS.blue,
    fields: [],
    footer: 'Use /balances to refresh this list',
  };
  if (records.length === 0) {
    embed.fields.push({
      name: '—',
      value: `No rows in ${currencyLabel} Balance sheet.`,
    });
    return embed;
  }
  const lines = records.map(
    (r) =>
      `• ${mentionUser(r.participantId)} **${r.name || '?'}** — ${r.balance} ${currencyLabel}`,
  );
  embed.fields.push({ name: 'Balances', value: joinFieldLines(lines) });
  return embed;
}

/** Member ids for filling in the balance sheet, first 50 by name */
export function memberIdsEmbed(
  members: Participant[],
  currencyLabel: string,
  idColumn: string,
): EmbedView {
  const sorted = [...members].sort((a, b) =>
    a.name.toLowerCase().localeCompare(b.name.toLowerCase()),
  );
  const shown = sorted.slice(0, MEMBER_LIST_LIMIT);
  const embed: EmbedView = {
    title: 'Discord User IDs',
    description: `Copy these for the ${currencyLabel} Balance sheet (${idColumn} column)`,
    color: COLORS.blue,
    fields: [
      {
        name: 'ID — Display Name',
        value:
          shown.length > 0
            ? joinFieldLines(shown.map((m) => `\`${m.id}\` — ${m.name}`))
            : 'No members found.',
      },
    ],
  };
  if (sorted.length > MEMBER_LIST_LIMIT) {
    embed.footer = `Showing first ${MEMBER_LIST_LIMIT} of ${sorted.length} members`;
  }
  return embed;
}

export function reminderMessage(
  playerName: string,
  thresholdHours: number,
  expiryHours: number,
): string {
  const hours = Math.trunc(thresholdHours);
  if (thresholdHours >= 2) {
    return `⏰ **${playerName}** — about **${hours} hours** left on this bid. No new bid in ${expiryHours}h wins!`;
  }
  return `⏰ **${playerName}** — about **${hours} hour** left on this bid! Last chance to outbid.`;
}

function winnerMention(auction: Auction): string {
  if (auction.currentBidderId) return mentionUser(auction.currentBidderId);
  return auction.currentBidderName || 'Unknown';
}

export function winnerThreadMessage(auction: Auction): string {
  return `🎉 **Auction complete!** ${auction.currentBidderName || 'Unknown'} wins **${auction.playerName}** for **${auction.currentBid}**. This thread is now archived and locked.`;
}

export function winnerChannelMessage(auction: Auction): string {
  return `🏆 **Auction ${auction.playerName} closed:** ${winnerMention(auction)} wins for **${auction.currentBid}**!`;
}

export function debitFailureMessage(
  auction: Auction,
  currencyLabel: string,
): string {
  return `⚠️ **${currencyLabel} deduction failed** — could not deduct ${auction.currentBid} from ${winnerMention(auction)}'s balance. Please update the ${currencyLabel} Balance sheet manually.`;
}

export function auctionStartedMessage(playerName: string, amount: number): string {
  return `Auction started for **${playerName}** — current bid: **${amount}**. Bid in the thread below with \`/bid <amount>\`.`;
}
