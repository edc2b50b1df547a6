import { ExternalServiceError } from '../common/errors';
import { createAuctionHarness, type AuctionHarness } from '../testing/fakes';
import { auctionEmbed } from './auction.presenter';

const DAY = 86_400;
const T0 = 1_000_000;

describe('ExpirySchedulerService', () => {
  let harness: AuctionHarness;

  const createAuction = (threadId = 't1', at = T0) =>
    harness.ledger.createAuction(
      {
        threadId,
        channelId: 'chan-1',
        guildId: 'guild-1',
        playerName: 'Prospect A',
        amount: 100,
        bidder: { id: 'alice', name: 'Alice' },
      },
      at,
    );

  beforeEach(async () => {
    harness = createAuctionHarness({ balances: { alice: 500, bob: 500 } });
    await createAuction();
  });

  afterEach(() => harness.close());

  describe('sweepReminders', () => {
    it('posts the 6h reminder once per bid', async () => {
      const now = T0 + DAY - 5.9 * 3600;

      expect(await harness.scheduler.sweepReminders(now)).toBe(1);
      expect(await harness.scheduler.sweepReminders(now + 60)).toBe(0);
      expect(harness.chat.contentIn('t1')).toEqual([
        '⏰ **Prospect A** — about **6 hours** left on this bid. No new bid in 24h wins!',
      ]);
    });

    it('posts the 1h reminder with its own wording', async () => {
      expect(await harness.scheduler.sweepReminders(T0 + DAY - 3600)).toBe(1);
      expect(harness.chat.contentIn('t1')).toEqual([
        '⏰ **Prospect A** — about **1 hour** left on this bid! Last chance to outbid.',
      ]);
    });

    it('does not double-post when sweeps overlap', async () => {
      const now = T0 + DAY - 5.9 * 3600;
      const counts = await Promise.all([
        harness.scheduler.sweepReminders(now),
        harness.scheduler.sweepReminders(now),
      ]);
      expect(counts[0] + counts[1]).toBe(1);
      expect(harness.chat.contentIn('t1')).toHaveLength(1);
    });

    it('keeps markers claimed by an overlapping sweep while a send is stalled', async () => {
      const now = T0 + DAY - 5.9 * 3600;
      let releaseSend: (id: string) => void = () => undefined;
      const stalledSend = new Promise<string>((resolve) => {
        releaseSend = resolve;
      });
      jest.spyOn(harness.chat, 'sendMessage').mockImplementationOnce(() => stalledSend);

      const slowSweep = harness.scheduler.sweepReminders(now);
      await new Promise((resolve) => setImmediate(resolve));
      await createAuction('t2', T0 - 600);

      expect(await harness.scheduler.sweepReminders(now)).toBe(1);
      releaseSend('msg-stalled');
      expect(await slowSweep).toBe(1);

      expect(await harness.scheduler.sweepReminders(now + 60)).toBe(0);
      expect(harness.chat.contentIn('t2')).toHaveLength(1);
    });

    it('starts over after a new bid', async () => {
      await harness.scheduler.sweepReminders(T0 + DAY - 5.9 * 3600);
      const bidAt = T0 + DAY - 5 * 3600;
      await harness.ledger.placeBid('t1', 150, { id: 'bob', name: 'Bob' }, bidAt);

      expect(await harness.scheduler.sweepReminders(bidAt + DAY - 5.9 * 3600)).toBe(1);
      expect(harness.chat.contentIn('t1')).toHaveLength(2);
    });

    it('retries a reminder whose send failed', async () => {
      const now = T0 + DAY - 5.9 * 3600;
      harness.chat.failures.set('sendMessage', new ExternalServiceError('chat', 'down'));
      expect(await harness.scheduler.sweepReminders(now)).toBe(0);

      harness.chat.failures.delete('sendMessage');
      expect(await harness.scheduler.sweepReminders(now + 300)).toBe(1);
    });

    it('stays quiet between windows and with 0.2h left', async () => {
      expect(await harness.scheduler.sweepReminders(T0 + DAY - 3 * 3600)).toBe(0);
      expect(await harness.scheduler.sweepReminders(T0 + DAY - 720)).toBe(0);
    });
  });

  describe('sweepCompletions', () => {
    it('leaves an auction with time left alone', async () => {
      expect(await harness.scheduler.sweepCompletions(T0 + DAY - 720)).toBe(0);
      expect(await harness.ledger.getByThread('t1')).toMatchObject({ status: 'active' });
    });

    it('completes and settles an expired auction exactly once across overlapping sweeps', async () => {
      const now = T0 + DAY;

      const [reminders, first, second] = await Promise.all([
        harness.scheduler.sweepReminders(now),
        harness.scheduler.sweepCompletions(now),
        harness.scheduler.sweepCompletions(now),
      ]);

      expect(reminders).toBe(0);
      expect(first + second).toBe(1);
      expect(await harness.ledger.getByThread('t1')).toMatchObject({ status: 'completed' });
      expect(harness.chat.closed).toEqual(['t1']);
      expect(harness.oracle.debits).toEqual([{ participantId: 'alice', amount: 100 }]);
      expect(harness.oracle.history).toHaveLength(1);
    });

    it('skips a row that received a bid after it was read', async () => {
      const [stale] = await harness.ledger.listActive();
      if (!stale) throw new Error('expected an active auction');
      await harness.ledger.placeBid('t1', 150, { id: 'bob', name: 'Bob' }, T0 + DAY);
      jest.spyOn(harness.auctions, 'listActive').mockResolvedValueOnce([stale]);

      expect(await harness.scheduler.sweepCompletions(T0 + DAY)).toBe(0);
      expect(await harness.ledger.getByThread('t1')).toMatchObject({
        status: 'active',
        currentBidderId: 'bob',
      });
    });

    it('keeps going when one settlement throws', async () => {
      await createAuction('t2');
      jest
        .spyOn(harness.settlement, 'settle')
        .mockRejectedValueOnce(new Error('unexpected'));

      expect(await harness.scheduler.sweepCompletions(T0 + DAY)).toBe(2);
      expect(await harness.ledger.listActive()).toEqual([]);
    });
  });

  describe('refreshDisplays', () => {
    it('rewrites the latest own card in each thread with the time left', async () => {
      await createAuction('t2');
      const [auction] = await harness.ledger.listActive();
      if (!auction) throw new Error('expected an active auction');
      const cardId = await harness.chat.sendMessage('t1', {
        embed: auctionEmbed(auction, { title: 'Auction: Prospect A', secondsLeft: DAY, expiryHours: 24 }),
      });

      expect(await harness.scheduler.refreshDisplays(T0 + 3600)).toBe(1);
      expect(harness.chat.edits).toHaveLength(1);
      const [edit] = harness.chat.edits;
      expect(edit?.messageId).toBe(cardId);
      expect(edit?.message.embed?.title).toBe('Current bid');
      expect(edit?.message.embed?.fields).toContainEqual({
        name: 'Time left',
        value: '23h 0m',
        inline: true,
      });
    });
  });

  describe('scheduling', () => {
    it('registers three named intervals and removes them on shutdown', () => {
      harness.scheduler.onApplicationBootstrap();
      expect(harness.schedulerRegistry.getIntervals()).toEqual([
        'auction-reminders',
        'auction-completions',
        'auction-displays',
      ]);

      harness.scheduler.onApplicationShutdown();
      expect(harness.schedulerRegistry.getIntervals()).toEqual([]);
    });

    it('skips sweeps while chat is offline', async () => {
      harness.chat.ready = false;
      const sweep = jest.fn(async () => 1);
      await harness.scheduler.runSweep('reminders', sweep);
      expect(sweep).not.toHaveBeenCalled();
    });

    it('contains a failing sweep', async () => {
      const sweep = jest.fn(async (): Promise<number> => {
        throw new Error('boom');
      });
      await expect(harness.scheduler.runSweep('completions', sweep)).resolves.toBeUndefined();
      expect(sweep).toHaveBeenCalledTimes(1);
    });
  });
});
