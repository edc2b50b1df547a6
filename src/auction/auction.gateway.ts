import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Events,
  GuildMember,
  type ChatInputCommandInteraction,
  type Client,
} from 'discord.js';
import { mentionChannel, type EmbedView } from '../chat/chat-surface';
import { DiscordChatService, toEmbed } from '../chat/discord-chat.service';
import { errorMessage } from '../common/errors';
import { AUCTION_COMMANDS } from './auction.commands';
import { memberIdsEmbed } from './auction.presenter';
import { AuctionService } from './auction.service';
import { AuctionEngine } from './engine';
import type { Participant } from './engine';
import { PinnedSummaryService } from './pinned-summary.service';

export const GENERIC_FAILURE =
  'Something went wrong. Try again or contact an admin.';

interface ChannelContext {
  inThread: boolean;
  parentChannelId: string | null;
}

/**
 * Slash-command surface: registers the commands once the client is ready
 * and turns each interaction into an AuctionService call.
 */
@Injectable()
export class AuctionGateway implements OnModuleInit {
  private readonly logger = new Logger(AuctionGateway.name);
  private readonly guildId: string | undefined;
  private readonly idColumn: string;

  constructor(
    private readonly discord: DiscordChatService,
    private readonly auctionService: AuctionService,
    private readonly pinnedSummary: PinnedSummaryService,
    private readonly engine: AuctionEngine,
    config: ConfigService,
  ) {
    this.guildId = config.get<string>('discord.guildId') || undefined;
    this.idColumn = config.get<string>('sheets.idColumn') ?? 'ID';
  }

  onModuleInit(): void {
    const client = this.discord.getClient();
    client.once(Events.ClientReady, (ready) => {
      void this.registerCommands(ready);
    });
    client.on(Events.InteractionCreate, (interaction) => {
      if (!interaction.isChatInputCommand()) return;
      void this.handleCommand(interaction);
    });
  }

  async registerCommands(client: Client<true>): Promise<void> {
    try {
      const commands = client.application.commands;
      if (this.guildId) {
        await commands.set(AUCTION_COMMANDS, this.guildId);
      } else {
        await commands.set(AUCTION_COMMANDS);
      }
      this.logger.log(
        `Registered ${AUCTION_COMMANDS.length} commands ${this.guildId ? `in guild ${this.guildId}` : 'globally'}`,
      );
    } catch (err) {
      this.logger.error(`Command registration failed: ${errorMessage(err)}`);
    }
  }

  /** Never rejects; unexpected errors become a generic private reply. */
  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    try {
      switch (interaction.commandName) {
        case 'auction':
          if (interaction.options.getSubcommand() === 'register') {
            await this.handleRegister(interaction);
          } else {
            await this.handleStart(interaction);
          }
          return;
        case 'bid':
          await this.handleBid(interaction);
          return;
        case 'auctions':
          await this.handleSummary(interaction, 'auctions');
          return;
        case 'balances':
          await this.handleSummary(interaction, 'balances');
          return;
        case 'discord-ids':
          await this.handleDiscordIds(interaction);
          return;
        default:
          this.logger.warn(`Unknown command /${interaction.commandName}`);
      }
    } catch (err) {
      this.logger.error(
        `/${interaction.commandName} failed: ${errorMessage(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      await this.replyPrivately(interaction, GENERIC_FAILURE);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  HANDLERS                                                           */
  /* ------------------------------------------------------------------ */

  private async handleStart(interaction: ChatInputCommandInteraction): Promise<void> {
    const { guildId } = interaction;
    if (!guildId) return this.replyPrivately(interaction, 'Use this command in a server channel.');
    const playerName = interaction.options.getString('player_name', true);
    const amount = interaction.options.getInteger('initial_bid', true);

    await interaction.deferReply({ ephemeral: true });
    const result = await this.auctionService.startAuction({
      guildId,
      channelId: interaction.channelId,
      inThread: this.channelContext(interaction).inThread,
      playerName,
      amount,
      starter: this.participantOf(interaction),
    });
    await interaction.editReply(
      result.started
        ? `Created auction thread for **${result.auction.playerName}** — ${mentionChannel(result.auction.threadId)}`
        : result.reason,
    );
  }

  private async handleRegister(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const { guildId } = interaction;
    if (!guildId) return this.replyPrivately(interaction, 'Use this command in a server channel.');
    const playerName = interaction.options.getString('player_name', true);
    const currentBid = interaction.options.getInteger('current_bid', true);
    const highBidder = interaction.options.getUser('high_bidder', true);
    const highBidderMember = interaction.options.getMember('high_bidder');
    const hoursRemaining = interaction.options.getNumber('hours_remaining', true);
    const context = this.channelContext(interaction);

    await interaction.deferReply({ ephemeral: true });
    const result = await this.auctionService.registerAuction({
      guildId,
      threadId: interaction.channelId,
      parentChannelId: context.parentChannelId,
      inThread: context.inThread,
      playerName,
      currentBid,
      highBidder: {
        id: highBidder.id,
        name:
          highBidderMember instanceof GuildMember
            ? highBidderMember.displayName
            : highBidder.displayName,
      },
      hoursRemaining,
    });
    await interaction.editReply(
      result.registered
        ? `Registered **${result.auction.playerName}** at **${result.auction.currentBid}**.`
        : result.reason,
    );
  }

  private async handleBid(interaction: ChatInputCommandInteraction): Promise<void> {
    if (!interaction.guildId) {
      return this.replyPrivately(interaction, 'Use this command in a server channel.');
    }
    const amount = interaction.options.getInteger('amount', true);

    await interaction.deferReply({ ephemeral: true });
    const result = await this.auctionService.placeBid({
      threadId: interaction.channelId,
      amount,
      bidder: this.participantOf(interaction),
    });
    await interaction.editReply(
      result.accepted
        ? `Bid of **${amount}** placed on **${result.auction.playerName}**.`
        : result.reason,
    );
  }

  private async handleSummary(
    interaction: ChatInputCommandInteraction,
    kind: 'auctions' | 'balances',
  ): Promise<void> {
    if (!interaction.guildId) {
      return this.replyPrivately(interaction, 'Use this command in a server channel.');
    }
    if (this.channelContext(interaction).inThread) {
      return this.replyPrivately(
        interaction,
        `Use \`/${kind}\` in the main channel (where auction threads live), not inside a thread.`,
      );
    }
    const placement = this.auctionService.checkChannel(interaction.channelId);
    if (!placement.ok) return this.replyPrivately(interaction, placement.reason);

    await interaction.deferReply();
    let embed: EmbedView;
    try {
      embed =
        kind === 'auctions'
          ? await this.pinnedSummary.refreshAuctions(interaction.channelId)
          : await this.pinnedSummary.refreshBalances(interaction.channelId);
    } catch (err) {
      this.logger.warn(`Pinned ${kind} refresh failed: ${errorMessage(err)}`);
      await interaction.editReply(`Could not update pinned list: ${errorMessage(err)}`);
      return;
    }
    const content =
      kind === 'auctions'
        ? '**Active auctions** — list updated. See pinned message above for quick links.'
        : `**${this.engine.settings.currencyLabel} balances** — list updated. See pinned message above for quick reference.`;
    await interaction.editReply({ content, embeds: [toEmbed(embed)] });
  }

  private async handleDiscordIds(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!interaction.inCachedGuild()) {
      return this.replyPrivately(interaction, 'Use this command in a server channel.');
    }
    await interaction.deferReply({ ephemeral: true });
    const members = await interaction.guild.members.fetch();
    const humans: Participant[] = [];
    for (const member of members.values()) {
      if (!member.user.bot) humans.push({ id: member.id, name: member.displayName });
    }
    const embed = memberIdsEmbed(
      humans,
      this.engine.settings.currencyLabel,
      this.idColumn,
    );
    await interaction.editReply({ embeds: [toEmbed(embed)] });
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private participantOf(interaction: ChatInputCommandInteraction): Participant {
    const { member, user } = interaction;
    return {
      id: user.id,
      name: member instanceof GuildMember ? member.displayName : user.displayName,
    };
  }

  private channelContext(interaction: ChatInputCommandInteraction): ChannelContext {
    const { channel } = interaction;
    if (channel?.isThread()) {
      return { inThread: true, parentChannelId: channel.parentId };
    }
    return { inThread: false, parentChannelId: null };
  }

  private async replyPrivately(
    interaction: ChatInputCommandInteraction,
    content: string,
  ): Promise<void> {
    try {
      if (interaction.deferred || interaction.replied) {
        await interaction.editReply(content);
      } else {
        await interaction.reply({ content, ephemeral: true });
      }
    } catch (err) {
      this.logger.warn(`Could not reply to /${interaction.commandName}: ${errorMessage(err)}`);
    }
  }
}
