export {
  AuctionEngine,
  DEFAULT_AUCTION_SETTINGS,
  epochSeconds,
} from './auction-engine';
export type {
  Auction,
  AuctionStatus,
  AuctionSettings,
  Availability,
  CreateAuctionInput,
  CreateAuctionResult,
  Participant,
  PlaceBidResult,
  RegisterAuctionInput,
  RegisterAuctionResult,
  Rejection,
  RejectionCode,
  RuleCheck,
  StartAuctionResult,
} from './types';
