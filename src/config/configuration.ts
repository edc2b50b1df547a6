export function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/** Parse a comma list of hours such as `6,1` into positive numbers. */
export function parseHoursList(
  value: string | undefined,
  fallback: number[],
): number[] {
  if (!value?.trim()) return fallback;
  const hours = value
    .split(',')
    .map((part) => Number(part.trim()))
    .filter((n) => Number.isFinite(n) && n > 0);
  return hours.length > 0 ? hours : fallback;
}

export default () => ({
  port: parseIntEnv(process.env.PORT, 3000),
  database: {
    path: process.env.AUCTION_DB_PATH ?? 'data/auctions.db',
  },
  discord: {
    token: process.env.DISCORD_TOKEN,
    guildId: process.env.DISCORD_GUILD_ID || undefined,
    auctionChannelId: process.env.DISCORD_AUCTION_CHANNEL_ID || undefined,
  },
  sheets: {
    credentialsPath: process.env.GOOGLE_CREDENTIALS_PATH,
    spreadsheetId: process.env.GOOGLE_SPREADSHEET_ID,
    balanceSheet: process.env.SHEETS_BALANCE_SHEET ?? 'POM Balance',
    historySheet: process.env.SHEETS_HISTORY_SHEET ?? 'Completed Auctions',
    idColumn: process.env.SHEETS_ID_COLUMN ?? 'ID',
    nameColumn: process.env.SHEETS_NAME_COLUMN ?? 'Name',
    balanceColumn: process.env.SHEETS_BALANCE_COLUMN ?? 'POM Balance',
  },
  auction: {
    bidExpiryHours: parseIntEnv(process.env.BID_EXPIRY_HOURS, 24),
    reminderThresholdsHours: parseHoursList(
      process.env.REMINDER_THRESHOLDS_HOURS,
      [6, 1],
    ),
    reminderIntervalSec: parseIntEnv(process.env.REMINDER_INTERVAL_SEC, 300),
    completionIntervalSec: parseIntEnv(
      process.env.COMPLETION_INTERVAL_SEC,
      60,
    ),
    displayIntervalSec: parseIntEnv(process.env.DISPLAY_INTERVAL_SEC, 60),
    minBid: 1,
    maxBid: 1_000_000,
    currencyLabel: process.env.CURRENCY_LABEL ?? 'POM',
  },
});
