import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Events } from 'discord.js';
import { DiscordChatService } from '../chat/discord-chat.service';
import { AUCTION_COMMANDS } from './auction.commands';
import { AuctionGateway, GENERIC_FAILURE } from './auction.gateway';
import { AuctionService } from './auction.service';
import { AuctionEngine } from './engine';
import { PinnedSummaryService } from './pinned-summary.service';

interface FakeInteractionOptions {
  sub?: string;
  values?: Record<string, string | number>;
  channelId?: string;
  thread?: { parentId: string } | null;
  guildId?: string | null;
}

function fakeInteraction(commandName: string, options: FakeInteractionOptions = {}) {
  const state = { deferred: false, replied: false };
  const values = options.values ?? {};
  return {
    commandName,
    guildId: options.guildId === undefined ? 'guild-1' : options.guildId,
    channelId: options.channelId ?? 'chan-1',
    channel: {
      isThread: () => Boolean(options.thread),
      parentId: options.thread?.parentId ?? null,
    },
    user: { id: 'alice', displayName: 'Alice' },
    member: null,
    get deferred() {
      return state.deferred;
    },
    get replied() {
      return state.replied;
    },
    options: {
      getSubcommand: jest.fn(() => options.sub ?? ''),
      getString: jest.fn((name: string) => values[name]),
      getInteger: jest.fn((name: string) => values[name]),
      getNumber: jest.fn((name: string) => values[name]),
      getUser: jest.fn(() => ({ id: 'bob', displayName: 'Bob' })),
      getMember: jest.fn(() => null),
    },
    inCachedGuild: jest.fn(() => options.guildId !== null),
    guild: {
      members: {
        fetch: jest.fn().mockResolvedValue(
          new Map([
            ['2', { id: '2', displayName: 'bob', user: { bot: false } }],
            ['9', { id: '9', displayName: 'AuctionBot', user: { bot: true } }],
            ['1', { id: '1', displayName: 'Alice', user: { bot: false } }],
          ]),
        ),
      },
    },
    deferReply: jest.fn(async () => {
      state.deferred = true;
    }),
    reply: jest.fn(async () => {
      state.replied = true;
    }),
    editReply: jest.fn().mockResolvedValue(undefined),
  };
}

describe('AuctionGateway', () => {
  let gateway: AuctionGateway;
  let auctionService: jest.Mocked<
    Pick<AuctionService, 'startAuction' | 'registerAuction' | 'placeBid' | 'checkChannel'>
  >;
  let pinnedSummary: jest.Mocked<Pick<PinnedSummaryService, 'refreshAuctions' | 'refreshBalances'>>;
  let client: { once: jest.Mock; on: jest.Mock };

  beforeEach(async () => {
    client = { once: jest.fn(), on: jest.fn() };
    auctionService = {
      startAuction: jest.fn(),
      registerAuction: jest.fn(),
      placeBid: jest.fn(),
      checkChannel: jest.fn().mockReturnValue({ ok: true }),
    };
    pinnedSummary = {
      refreshAuctions: jest.fn().mockResolvedValue({
        title: '📌 Active Auctions',
        color: 0x3498db,
        fields: [],
      }),
      refreshBalances: jest.fn(),
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuctionGateway,
        { provide: DiscordChatService, useValue: { getClient: () => client } },
        { provide: AuctionService, useValue: auctionService },
        { provide: PinnedSummaryService, useValue: pinnedSummary },
        { provide: AuctionEngine, useValue: new AuctionEngine() },
        {
          provide: ConfigService,
          useValue: new ConfigService({ discord: { guildId: 'guild-1' } }),
        },
      ],
    }).compile();

    gateway = module.get(AuctionGateway);
  });

  describe('wiring', () => {
    it('listens for ready and interactions on init', () => {
      gateway.onModuleInit();
      expect(client.once).toHaveBeenCalledWith(Events.ClientReady, expect.any(Function));
      expect(client.on).toHaveBeenCalledWith(Events.InteractionCreate, expect.any(Function));
    });

    it('ignores interactions that are not slash commands', () => {
      gateway.onModuleInit();
      const [, listener] = client.on.mock.calls[0];
      listener({ isChatInputCommand: () => false });
      expect(auctionService.placeBid).not.toHaveBeenCalled();
    });

    it('registers the commands in the configured guild', async () => {
      const set = jest.fn().mockResolvedValue(undefined);
      await gateway.registerCommands({ application: { commands: { set } } } as never);
      expect(set).toHaveBeenCalledWith(AUCTION_COMMANDS, 'guild-1');
      expect(AUCTION_COMMANDS.map((c) => c.name)).toEqual([
        'auction',
        'bid',
        'auctions',
        'balances',
        'discord-ids',
      ]);
    });
  });

  it('bounds bid amounts to the allowed range on the client', () => {
    const [auction, bid] = AUCTION_COMMANDS;
    const amountRange = { min_value: 1, max_value: 1_000_000 };

    expect(bid).toMatchObject({ name: 'bid', options: [{ name: 'amount', ...amountRange }] });
    expect(auction).toMatchObject({
      options: [
        { name: 'start', options: [{ name: 'player_name' }, { name: 'initial_bid', ...amountRange }] },
        {
          name: 'register',
          options: [
            { name: 'player_name' },
            { name: 'current_bid', ...amountRange },
            { name: 'high_bidder' },
            { name: 'hours_remaining', min_value: 0, max_value: 24 },
          ],
        },
      ],
    });
  });

  describe('/auction start', () => {
    it('passes the request through and links the new thread', async () => {
      auctionService.startAuction.mockResolvedValue({
        started: true,
        auction: {
          threadId: 't1',
          channelId: 'chan-1',
          guildId: 'guild-1',
          playerName: 'Prospect A',
          currentBid: 100,
          currentBidderId: 'alice',
          currentBidderName: 'Alice',
          createdAt: 0,
          lastBidAt: 0,
          status: 'active',
        },
      });
      const interaction = fakeInteraction('auction', {
        sub: 'start',
        values: { player_name: 'Prospect A', initial_bid: 100 },
      });

      await gateway.handleCommand(interaction as never);

      expect(interaction.deferReply).toHaveBeenCalledWith({ ephemeral: true });
      expect(auctionService.startAuction).toHaveBeenCalledWith({
        guildId: 'guild-1',
        channelId: 'chan-1',
        inThread: false,
        playerName: 'Prospect A',
        amount: 100,
        starter: { id: 'alice', name: 'Alice' },
      });
      expect(interaction.editReply).toHaveBeenCalledWith(
        'Created auction thread for **Prospect A** — <#t1>',
      );
    });

    it('shows the rejection reason', async () => {
      auctionService.startAuction.mockResolvedValue({
        started: false,
        code: 'OVER_BUDGET',
        reason: 'not enough',
      });
      const interaction = fakeInteraction('auction', {
        sub: 'start',
        values: { player_name: 'Prospect A', initial_bid: 100 },
      });

      await gateway.handleCommand(interaction as never);

      expect(interaction.editReply).toHaveBeenCalledWith('not enough');
    });

    it('refuses direct messages', async () => {
      const interaction = fakeInteraction('auction', { sub: 'start', guildId: null });
      await gateway.handleCommand(interaction as never);
      expect(interaction.reply).toHaveBeenCalledWith({
        content: 'Use this command in a server channel.',
        ephemeral: true,
      });
      expect(auctionService.startAuction).not.toHaveBeenCalled();
    });
  });

  it('/auction register reads the thread and its parent', async () => {
    auctionService.registerAuction.mockResolvedValue({
      registered: false,
      code: 'DUPLICATE_THREAD',
      reason: 'already tracked',
    });
    const interaction = fakeInteraction('auction', {
      sub: 'register',
      channelId: 'thread-9',
      thread: { parentId: 'chan-parent' },
      values: { player_name: 'Legacy', current_bid: 80, hours_remaining: 2.5 },
    });

    await gateway.handleCommand(interaction as never);

    expect(auctionService.registerAuction).toHaveBeenCalledWith({
      guildId: 'guild-1',
      threadId: 'thread-9',
      parentChannelId: 'chan-parent',
      inThread: true,
      playerName: 'Legacy',
      currentBid: 80,
      highBidder: { id: 'bob', name: 'Bob' },
      hoursRemaining: 2.5,
    });
    expect(interaction.editReply).toHaveBeenCalledWith('already tracked');
  });

  it('/bid places the bid in the current thread', async () => {
    auctionService.placeBid.mockResolvedValue({
      accepted: false,
      code: 'BID_TOO_LOW',
      reason: 'too low',
    });
    const interaction = fakeInteraction('bid', {
      channelId: 'thread-1',
      thread: { parentId: 'chan-1' },
      values: { amount: 150 },
    });

    await gateway.handleCommand(interaction as never);

    expect(auctionService.placeBid).toHaveBeenCalledWith({
      threadId: 'thread-1',
      amount: 150,
      bidder: { id: 'alice', name: 'Alice' },
    });
    expect(interaction.editReply).toHaveBeenCalledWith('too low');
  });

  describe('/auctions and /balances', () => {
    it('refuses to run inside a thread', async () => {
      const interaction = fakeInteraction('auctions', { thread: { parentId: 'chan-1' } });
      await gateway.handleCommand(interaction as never);
      expect(interaction.reply).toHaveBeenCalledWith({
        content:
          'Use `/auctions` in the main channel (where auction threads live), not inside a thread.',
        ephemeral: true,
      });
      expect(pinnedSummary.refreshAuctions).not.toHaveBeenCalled();
    });

    it('refreshes the pinned list and echoes it', async () => {
      const interaction = fakeInteraction('auctions');
      await gateway.handleCommand(interaction as never);
      expect(pinnedSummary.refreshAuctions).toHaveBeenCalledWith('chan-1');
      expect(interaction.deferReply).toHaveBeenCalledWith();
      expect(interaction.editReply).toHaveBeenCalledWith({
        content:
          '**Active auctions** — list updated. See pinned message above for quick links.',
        embeds: [expect.anything()],
      });
    });

    it('reports a failed balances refresh', async () => {
      pinnedSummary.refreshBalances.mockRejectedValue(new Error('sheet down'));
      const interaction = fakeInteraction('balances');
      await gateway.handleCommand(interaction as never);
      expect(interaction.editReply).toHaveBeenCalledWith(
        'Could not update pinned list: sheet down',
      );
    });
  });

  it('/discord-ids lists human members sorted by name', async () => {
    const interaction = fakeInteraction('discord-ids');
    await gateway.handleCommand(interaction as never);

    const [payload] = interaction.editReply.mock.calls[0];
    expect(payload.embeds[0].data.fields).toEqual([
      { name: 'ID — Display Name', value: '`1` — Alice\n`2` — bob' },
    ]);
  });

  it('turns unexpected errors into a generic private reply', async () => {
    auctionService.placeBid.mockRejectedValue(new Error('database is locked'));
    const interaction = fakeInteraction('bid', { values: { amount: 150 } });

    await gateway.handleCommand(interaction as never);

    expect(interaction.editReply).toHaveBeenCalledWith(GENERIC_FAILURE);
  });
});
