import {
  SlashCommandBuilder,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { THREAD_NAME_MAX_LENGTH } from '../chat/chat-surface';
import { DEFAULT_AUCTION_SETTINGS } from './engine';

const { minBid, maxBid } = DEFAULT_AUCTION_SETTINGS;

const auction = new SlashCommandBuilder()
  .setName('auction')
  .setDescription('Start or register a player auction')
  .addSubcommand((sub) =>
    sub
      .setName('start')
      .setDescription('Start a new auction thread for a player')
      .addStringOption((option) =>
        option
          .setName('player_name')
          .setDescription('Player being auctioned')
          .setRequired(true)
          .setMaxLength(THREAD_NAME_MAX_LENGTH),
      )
      .addIntegerOption((option) =>
        option
          .setName('initial_bid')
          .setDescription('Opening bid; you become the first high bidder')
          .setRequired(true)
          .setMinValue(minBid)
          .setMaxValue(maxBid),
      ),
  )
  .addSubcommand((sub) =>
    sub
      .setName('register')
      .setDescription('Track an existing auction thread (run inside the thread)')
      .addStringOption((option) =>
        option
          .setName('player_name')
          .setDescription('Player being auctioned')
          .setRequired(true),
      )
      .addIntegerOption((option) =>
        option
          .setName('current_bid')
          .setDescription('Current high bid')
          .setRequired(true)
          .setMinValue(minBid)
          .setMaxValue(maxBid),
      )
      .addUserOption((option) =>
        option
          .setName('high_bidder')
          .setDescription('Current high bidder')
          .setRequired(true),
      )
      .addNumberOption((option) =>
        option
          .setName('hours_remaining')
          .setDescription('Hours left on the clock (0 to 24)')
          .setRequired(true)
          .setMinValue(0)
          .setMaxValue(24),
      ),
  );

const bid = new SlashCommandBuilder()
  .setName('bid')
  .setDescription('Place a bid in this auction thread')
  .addIntegerOption((option) =>
    option
      .setName('amount')
      .setDescription('Your bid; must beat the current bid')
      .setRequired(true)
      .setMinValue(minBid)
      .setMaxValue(maxBid),
  );

const auctions = new SlashCommandBuilder()
  .setName('auctions')
  .setDescription('Refresh the pinned list of active auctions in this channel');

const balances = new SlashCommandBuilder()
  .setName('balances')
  .setDescription('Refresh the pinned balances list in this channel');

const discordIds = new SlashCommandBuilder()
  .setName('discord-ids')
  .setDescription('List member IDs for filling in the balance sheet');

export const AUCTION_COMMANDS: RESTPostAPIChatInputApplicationCommandsJSONBody[] =
  [
    auction.toJSON(),
    bid.toJSON(),
    auctions.toJSON(),
    balances.toJSON(),
    discordIds.toJSON(),
  ];
