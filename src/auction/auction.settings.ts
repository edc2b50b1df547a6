import { ConfigService } from '@nestjs/config';
import { DEFAULT_AUCTION_SETTINGS, type AuctionSettings } from './engine';

export interface SweepIntervals {
  reminderIntervalSec: number;
  completionIntervalSec: number;
  displayIntervalSec: number;
}

export function loadAuctionSettings(config: ConfigService): AuctionSettings {
  const d = DEFAULT_AUCTION_SETTINGS;
  return {
    bidExpiryHours: config.get<number>('auction.bidExpiryHours') ?? d.bidExpiryHours,
    reminderThresholdsHours:
      config.get<number[]>('auction.reminderThresholdsHours') ??
      d.reminderThresholdsHours,
    minBid: config.get<number>('auction.minBid') ?? d.minBid,
    maxBid: config.get<number>('auction.maxBid') ?? d.maxBid,
    currencyLabel: config.get<string>('auction.currencyLabel') ?? d.currencyLabel,
  };
}

export function loadSweepIntervals(config: ConfigService): SweepIntervals {
  return {
    reminderIntervalSec: config.get<number>('auction.reminderIntervalSec') ?? 300,
    completionIntervalSec:
      config.get<number>('auction.completionIntervalSec') ?? 60,
    displayIntervalSec: config.get<number>('auction.displayIntervalSec') ?? 60,
  };
}
